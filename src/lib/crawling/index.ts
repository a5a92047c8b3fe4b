/**
 * Crawling System
 * Main export file for the crawl frontier and fetcher pool
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './robots-parser';
export * from './fetch-errors';
export * from './crawl-config';
export * from './frontier';
export * from './politeness-gate';
export * from './fetcher';
export * from './crawling-statistics';
export * from './crawl-session';
