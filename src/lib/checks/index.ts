/**
 * Checks
 * Main export file for the technical check engine
 */

export * from './check.types';
export * from './finding';
export * from './crawl-index';
export * from './check.registry';
export * from './check-engine';
export { parseViewport } from './checks/mobile-meta.check';
