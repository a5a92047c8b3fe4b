/**
 * Site Audit Crawler
 * Public library surface: crawl sessions, checks and reports
 */

export * from './lib/crawling';
export * from './lib/page-model';
export * from './lib/checks';
export * from './lib/report';
export * from './lib/circuit-breaker';
