/**
 * Circuit Breaker System
 * Main export file for per-host circuit breaking
 */

export * from './circuit-breaker.types';
export * from './circuit-breaker.manager';
