/**
 * Page Fetcher
 * One logical fetch per crawl task: politeness-gated requests with timeout,
 * retry/backoff and manual redirect-chain resolution
 */

import {
  CrawlConfig,
  CrawlLogger,
  FetchResult,
  HttpClient,
  OutcomeKind,
  RawResponse,
  RedirectHop,
} from './crawling.types';
import { PolitenessGate } from './politeness-gate';
import { HostCircuitBreakers } from '../circuit-breaker';
import {
  calculateRetryDelay,
  classifyError,
  classifyStatus,
  FetchError,
  RetryDecision,
  shouldRetry,
  sleep,
} from './fetch-errors';
import { extractHost, tryNormalizeUrl } from './url-normalizer';
import { readResponseBody } from './response-body';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

type AttemptResult =
  | { kind: 'response'; response: RawResponse; attempts: number }
  | { kind: 'error'; error: FetchError; attempts: number };

/**
 * Default transport: Node's global fetch
 */
export const defaultHttpClient: HttpClient = (url, init) => fetch(url, init);

export function isRedirectStatus(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/**
 * Absolute address a Location header points at, fragment dropped and otherwise
 * untouched. Null when it does not resolve to an http(s) URL.
 */
export function resolveRedirectTarget(location: string, base: string): string | null {
  let target: URL;
  try {
    target = new URL(location.trim(), base);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
  if (target.protocol !== 'http:' && target.protocol !== 'https:') return null;
  target.hash = '';
  return target.href;
}

/**
 * Terminal outcome for a fetch result
 */
export function outcomeOf(result: FetchResult): OutcomeKind {
  if (result.malformedRedirect) return 'malformed';
  if (result.status === null || result.redirectLoop || result.error) return 'failed';
  return result.status < 400 ? 'fetched' : 'failed';
}

export class PageFetcher {
  constructor(
    private readonly config: CrawlConfig,
    private readonly gate: PolitenessGate,
    private readonly httpClient: HttpClient,
    private readonly breakers: HostCircuitBreakers,
    private readonly logger: CrawlLogger = console
  ) {}

  /**
   * Fetch a URL, following redirects hop by hop. Never throws for per-page failures.
   * Hops are requested exactly as the server names them; loops are detected on those addresses.
   */
  async fetch(url: string): Promise<FetchResult> {
    const chain: RedirectHop[] = [];
    const seen = new Set<string>([url]);
    let current = url;
    let attempts = 0;

    for (;;) {
      const result = await this.fetchWithRetries(current);
      attempts += result.attempts;

      if (result.kind === 'error') {
        return this.buildResult(url, current, null, chain, attempts, {
          error: result.error.message,
          errorType: result.error.type,
        });
      }

      const response = result.response;
      if (!isRedirectStatus(response.status)) {
        return this.buildResult(url, current, response, chain, attempts);
      }

      const location = response.headers['location'];
      if (!location) {
        // A 3xx without Location is a final response
        return this.buildResult(url, current, response, chain, attempts);
      }

      const next = resolveRedirectTarget(location, current);
      if (next === null) {
        chain.push({ url: current, status: response.status, location: null });
        return this.buildResult(url, current, response, chain, attempts, {
          error: `Malformed redirect location: ${location}`,
          malformedRedirect: true,
        });
      }

      chain.push({ url: current, status: response.status, location: next });

      if (seen.has(next)) {
        return this.buildResult(url, current, response, chain, attempts, {
          error: `Redirect loop back to ${next}`,
          redirectLoop: true,
        });
      }

      if (chain.length > this.config.maxRedirects) {
        return this.buildResult(url, current, response, chain, attempts, {
          error: `Too many redirects (more than ${this.config.maxRedirects})`,
        });
      }

      if (!(await this.gate.mayFetch(next))) {
        return this.buildResult(url, current, response, chain, attempts, {
          redirectBlockedByRobots: true,
        });
      }

      seen.add(next);
      current = next;
    }
  }

  /**
   * Request one URL, retrying transport errors, 5xx and 429.
   * The host lease is held for the request only, never across a backoff.
   */
  private async fetchWithRetries(url: string): Promise<AttemptResult> {
    const host = extractHost(url);

    for (let attempt = 0; ; attempt++) {
      const lease = await this.gate.acquire(url);
      let result: AttemptResult;

      try {
        const response = await this.breakers.execute(host, () => this.request(url));
        result = { kind: 'response', response, attempts: attempt + 1 };
      } catch (error) {
        result = { kind: 'error', error: classifyError(error), attempts: attempt + 1 };
      } finally {
        lease.release();
      }

      const decision: RetryDecision | null =
        result.kind === 'error'
          ? result.error
          : classifyStatus(result.response.status, result.response.headers['retry-after'] ?? null);
      if (!decision || !shouldRetry(decision, attempt + 1, this.config.maxRetries)) {
        return result;
      }

      const delay = calculateRetryDelay(decision, attempt, this.backoff());
      const reason = result.kind === 'error' ? decision.type : `HTTP ${result.response.status}`;
      this.logger.log(`Retry attempt ${attempt + 1}/${this.config.maxRetries} for ${url} after ${delay}ms (${reason})`);
      await sleep(delay);
    }
  }

  /**
   * Single HTTP GET with a timeout that covers the body read
   */
  private async request(url: string): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.fetchTimeoutMs);
    const startedAt = Date.now();

    try {
      const response = await this.httpClient(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'manual',
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });
      const body = await readResponseBody(response, this.config.maxBodyBytes);

      return {
        url,
        status: response.status,
        headers,
        body: body.text,
        rawBody: body.bytes,
        byteSize: body.byteSize,
        truncated: body.truncated,
        latencyMs: Date.now() - startedAt,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private backoff() {
    return {
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.maxRetryDelayMs,
      jitterMs: this.config.retryJitterMs,
    };
  }

  private buildResult(
    url: string,
    responseUrl: string,
    response: RawResponse | null,
    chain: RedirectHop[],
    attempts: number,
    extra: {
      error?: string;
      errorType?: string;
      redirectLoop?: boolean;
      malformedRedirect?: boolean;
      redirectBlockedByRobots?: boolean;
    } = {}
  ): FetchResult {
    const identity = tryNormalizeUrl(responseUrl, undefined, this.config.normalize);

    return Object.freeze({
      url,
      finalUrl: identity.ok ? identity.url : responseUrl,
      responseUrl,
      status: response ? response.status : null,
      latencyMs: response ? response.latencyMs : 0,
      headers: Object.freeze({ ...(response?.headers ?? {}) }),
      body: response ? response.body : null,
      rawBody: response ? response.rawBody : null,
      contentType: response?.headers['content-type'] ?? null,
      byteSize: response ? response.byteSize : 0,
      truncated: response ? response.truncated : false,
      redirectChain: Object.freeze([...chain]),
      redirectLoop: extra.redirectLoop ?? false,
      malformedRedirect: extra.malformedRedirect ?? false,
      redirectBlockedByRobots: extra.redirectBlockedByRobots ?? false,
      attempts,
      error: extra.error ?? null,
      errorType: extra.errorType ?? null,
    });
  }
}
