/**
 * Circuit Breaker Types
 * Type definitions for per-host circuit breaking
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',      // Normal operation, requests pass through
  OPEN = 'open',          // Circuit is open, requests fail immediately
  HALF_OPEN = 'half_open', // Testing state, limited requests allowed
}

/**
 * Circuit breaker statistics for one host
 */
export interface CircuitBreakerStats {
  host: string;
  state: CircuitState;
  failures: number;
  successes: number;
  rejected: number;
  totalRequests: number;
  lastFailureTime?: number;
  errorRate: number;
}

/**
 * Circuit breaker event types
 */
export enum CircuitBreakerEvent {
  OPEN = 'open',
  CLOSE = 'close',
  HALF_OPEN = 'half_open',
}
