/**
 * Host Circuit Breaker Tests
 */

import { HostCircuitBreakers } from '../circuit-breaker.manager';
import { CircuitBreakerEvent, CircuitState } from '../circuit-breaker.types';
import { FetchError, FetchErrorType } from '../../crawling/fetch-errors';
import type { RawResponse } from '../../crawling/crawling.types';

function rawResponse(status: number): RawResponse {
  return {
    url: 'https://site.test/',
    status,
    headers: {},
    body: '',
    rawBody: new Uint8Array(0),
    byteSize: 0,
    truncated: false,
    latencyMs: 1,
  };
}

describe('HostCircuitBreakers', () => {
  let breakers: HostCircuitBreakers;

  afterEach(() => {
    breakers.shutdown();
  });

  it('should run attempts directly when disabled', async () => {
    breakers = new HostCircuitBreakers({
      enabled: false,
      errorThresholdPercentage: 50,
      resetTimeoutMs: 1000,
      volumeThreshold: 1,
    });
    const attempt = jest.fn(async () => rawResponse(500));

    for (let i = 0; i < 5; i++) {
      expect((await breakers.execute('site.test', attempt)).status).toBe(500);
    }

    expect(attempt).toHaveBeenCalledTimes(5);
    expect(breakers.getStats()).toEqual([]);
  });

  describe('when enabled', () => {
    beforeEach(() => {
      breakers = new HostCircuitBreakers({
        enabled: true,
        errorThresholdPercentage: 50,
        resetTimeoutMs: 60000,
        volumeThreshold: 2,
      });
    });

    it('should return 5xx responses while counting them as failures', async () => {
      const response = await breakers.execute('site.test', async () => rawResponse(503));

      expect(response.status).toBe(503);
      expect(breakers.getStats()).toEqual([
        expect.objectContaining({ host: 'site.test', failures: 1, successes: 0, state: CircuitState.CLOSED }),
      ]);
    });

    it('should open after repeated failures and fail fast', async () => {
      const opened: string[] = [];
      breakers.on(CircuitBreakerEvent.OPEN, (host: string) => opened.push(host));
      const attempt = jest.fn(async () => rawResponse(500));

      await breakers.execute('site.test', attempt);
      await breakers.execute('site.test', attempt);

      expect(opened).toEqual(['site.test']);
      expect(breakers.getState('site.test')).toBe(CircuitState.OPEN);

      const rejection = breakers.execute('site.test', attempt);
      await expect(rejection).rejects.toBeInstanceOf(FetchError);
      await expect(rejection).rejects.toMatchObject({
        type: FetchErrorType.CIRCUIT_OPEN,
        message: 'Circuit open for site.test',
        retryable: false,
      });
      expect(attempt).toHaveBeenCalledTimes(2);
    });

    it('should keep hosts independent', async () => {
      await breakers.execute('a.test', async () => rawResponse(500));
      await breakers.execute('a.test', async () => rawResponse(500));

      expect(breakers.getState('a.test')).toBe(CircuitState.OPEN);
      expect(breakers.getState('b.test')).toBe(CircuitState.CLOSED);
      expect((await breakers.execute('b.test', async () => rawResponse(200))).status).toBe(200);
    });
  });
});
