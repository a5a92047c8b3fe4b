/**
 * Report
 */

export * from './report.types';
export * from './audit-report';
