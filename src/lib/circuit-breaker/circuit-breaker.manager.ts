/**
 * Circuit Breaker Manager
 * One opossum breaker per crawled host; 5xx responses and transport errors count as failures
 */

import CircuitBreakerLib from 'opossum';
import { EventEmitter } from 'events';
import { CircuitBreakerEvent, CircuitBreakerStats, CircuitState } from './circuit-breaker.types';
import type { HostCircuitBreakerConfig, RawResponse } from '../crawling/crawling.types';
import { FetchError, FetchErrorType } from '../crawling/fetch-errors';

type Attempt = () => Promise<RawResponse>;

/**
 * Carries a 5xx response through the breaker so it is counted as a failure
 */
class UpstreamStatusError extends Error {
  constructor(readonly response: RawResponse) {
    super(`Upstream responded with HTTP ${response.status}`);
    this.name = 'UpstreamStatusError';
  }
}

interface HostBreaker {
  breaker: CircuitBreakerLib<[Attempt], RawResponse>;
  failures: number;
  successes: number;
  rejected: number;
  lastFailureTime?: number;
}

function isOpenCircuitError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EOPENBREAKER';
}

export class HostCircuitBreakers extends EventEmitter {
  private breakers: Map<string, HostBreaker> = new Map();

  constructor(private readonly config: Readonly<HostCircuitBreakerConfig>) {
    super();
  }

  /**
   * Run one HTTP attempt through the host's breaker.
   * With breaking disabled the attempt runs directly.
   */
  async execute(host: string, attempt: Attempt): Promise<RawResponse> {
    if (!this.config.enabled) {
      return attempt();
    }

    const entry = this.getBreaker(host);

    try {
      return await entry.breaker.fire(async () => {
        const response = await attempt();
        if (response.status >= 500) {
          throw new UpstreamStatusError(response);
        }
        return response;
      });
    } catch (error) {
      if (error instanceof UpstreamStatusError) {
        return error.response;
      }
      if (isOpenCircuitError(error)) {
        throw new FetchError(FetchErrorType.CIRCUIT_OPEN, `Circuit open for ${host}`, false);
      }
      throw error;
    }
  }

  getState(host: string): CircuitState {
    const entry = this.breakers.get(host);
    if (!entry) {
      return CircuitState.CLOSED;
    }

    return entry.breaker.opened ? CircuitState.OPEN :
           entry.breaker.halfOpen ? CircuitState.HALF_OPEN :
           CircuitState.CLOSED;
  }

  getStats(): CircuitBreakerStats[] {
    return Array.from(this.breakers.entries()).map(([host, entry]) => {
      const totalRequests = entry.failures + entry.successes;
      return {
        host,
        state: this.getState(host),
        failures: entry.failures,
        successes: entry.successes,
        rejected: entry.rejected,
        totalRequests,
        lastFailureTime: entry.lastFailureTime,
        errorRate: totalRequests > 0 ? (entry.failures / totalRequests) * 100 : 0,
      };
    });
  }

  /**
   * Stop every breaker's rolling-window timers
   */
  shutdown(): void {
    for (const entry of this.breakers.values()) {
      entry.breaker.shutdown();
    }
    this.breakers.clear();
  }

  private getBreaker(host: string): HostBreaker {
    const existing = this.breakers.get(host);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreakerLib((attempt: Attempt) => attempt(), {
      timeout: false, // request timeouts are enforced by the fetcher
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeoutMs,
      volumeThreshold: this.config.volumeThreshold,
      rollingCountTimeout: 60000,
      rollingCountBuckets: 10,
      name: `host:${host}`,
    });

    const entry: HostBreaker = { breaker, failures: 0, successes: 0, rejected: 0 };

    breaker.on('success', () => {
      entry.successes++;
    });

    breaker.on('failure', () => {
      entry.failures++;
      entry.lastFailureTime = Date.now();
    });

    breaker.on('reject', () => {
      entry.rejected++;
    });

    breaker.on('open', () => {
      this.emit(CircuitBreakerEvent.OPEN, host);
    });

    breaker.on('halfOpen', () => {
      this.emit(CircuitBreakerEvent.HALF_OPEN, host);
    });

    breaker.on('close', () => {
      this.emit(CircuitBreakerEvent.CLOSE, host);
    });

    this.breakers.set(host, entry);
    return entry;
  }
}
