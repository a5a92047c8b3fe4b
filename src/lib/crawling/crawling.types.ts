/**
 * Crawling Types
 * Type definitions for the crawl frontier, politeness gate and fetcher pool
 */

import type { CheckConfig } from '../checks/check.types';

/**
 * Trailing slash handling applied during URL normalization
 */
export type TrailingSlashPolicy = 'strip' | 'add' | 'preserve';

/**
 * URL normalization options
 */
export interface NormalizeOptions {
  /**
   * Trailing slash policy (root path always keeps its slash)
   */
  trailingSlash: TrailingSlashPolicy;

  /**
   * Query parameters to drop. Entries ending in `*` match by prefix.
   */
  stripQueryParams: readonly string[];
}

/**
 * Per-host circuit breaker settings
 */
export interface HostCircuitBreakerConfig {
  enabled: boolean;
  errorThresholdPercentage: number;
  resetTimeoutMs: number;
  volumeThreshold: number;
}

/**
 * Seed configuration supplied by the caller. Everything except the seed URL is optional.
 */
export interface SeedConfiguration {
  seedUrl: string;
  maxDepth?: number;
  maxPages?: number;
  concurrency?: number;
  perHostConcurrency?: number;
  crawlDelayFloorMs?: number;
  fetchTimeoutMs?: number;
  /**
   * Wall-clock limit for the whole session; null or 0 means none
   */
  timeLimitMs?: number | null;
  userAgent?: string;
  trailingSlash?: TrailingSlashPolicy;
  stripQueryParams?: string[];
  maxRetries?: number;
  retryBaseDelayMs?: number;
  maxRetryDelayMs?: number;
  retryJitterMs?: number;
  maxRedirects?: number;
  maxBodyBytes?: number;
  crawlResources?: boolean;
  blockedPatterns?: string[];
  checks?: Partial<CheckConfig>;
  circuitBreaker?: Partial<HostCircuitBreakerConfig>;
}

/**
 * Validated, immutable crawl session configuration
 */
export interface CrawlConfig {
  /**
   * Normalized seed URL
   */
  readonly seedUrl: string;

  /**
   * Maximum crawl depth (0 = seed only)
   */
  readonly maxDepth: number;

  /**
   * Maximum number of URLs admitted to the frontier
   */
  readonly maxPages: number;

  /**
   * Number of concurrent fetch workers
   */
  readonly concurrency: number;

  /**
   * Maximum in-flight requests to a single host
   */
  readonly perHostConcurrency: number;

  /**
   * Minimum spacing between request starts to one host, in milliseconds
   */
  readonly crawlDelayFloorMs: number;

  /**
   * Timeout for a single HTTP request including the body read
   */
  readonly fetchTimeoutMs: number;

  /**
   * Wall-clock deadline for admission of new work (null = none)
   */
  readonly timeLimitMs: number | null;

  readonly userAgent: string;
  readonly normalize: Readonly<NormalizeOptions>;

  /**
   * Retries after the first attempt for retryable failures
   */
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly maxRetryDelayMs: number;
  readonly retryJitterMs: number;
  readonly maxRedirects: number;
  readonly maxBodyBytes: number;

  /**
   * Whether images, scripts and stylesheets are fetched as well as pages
   */
  readonly crawlResources: boolean;

  /**
   * URL patterns (regex sources) never admitted to the frontier
   */
  readonly blockedPatterns: readonly string[];

  readonly checks: Readonly<CheckConfig>;
  readonly circuitBreaker: Readonly<HostCircuitBreakerConfig>;
}

/**
 * Unit of crawl work. Frozen once created.
 */
export interface CrawlTask {
  readonly url: string;

  /**
   * Crawl depth (0 = seed)
   */
  readonly depth: number;

  /**
   * URL where this link was discovered (null for the seed)
   */
  readonly parentUrl: string | null;

  readonly discoveredAt: number;
}

/**
 * Terminal disposition of a URL
 */
export type OutcomeKind = 'fetched' | 'failed' | 'skipped-robots' | 'malformed' | 'unvisited';

/**
 * One hop of a redirect chain
 */
export interface RedirectHop {
  url: string;
  status: number;
  location: string | null;
}

/**
 * Inventory record for a crawled (or deliberately skipped) URL
 */
export interface InventoryEntry {
  url: string;
  outcome: OutcomeKind;

  /**
   * Final HTTP status (null when no response was received)
   */
  status: number | null;
  depth: number;
  parentUrl: string | null;

  /**
   * Address after redirect resolution
   */
  finalUrl: string;
  redirectChain: RedirectHop[];
  attempts: number;
  latencyMs: number;
  contentType: string | null;
  error: string | null;
}

/**
 * Result of a frontier insertion
 */
export type EnqueueResult = 'queued' | 'duplicate' | 'depth-exceeded' | 'budget-exhausted' | 'closed';

/**
 * Why a crawl session stopped
 */
export type StopReason = 'drained' | 'deadline' | 'cancelled';

/**
 * Politeness gate host phases
 */
export type HostPhase = 'unknown' | 'fetching-robots' | 'rules-loaded' | 'robots-unavailable';

/**
 * Minimal response shape consumed by the fetcher (satisfied by the global fetch Response)
 */
export interface HttpResponse {
  status: number;
  headers: {
    get(name: string): string | null;
    forEach(callback: (value: string, key: string) => void): void;
  };

  /**
   * Body as a byte stream (null for an empty body)
   */
  body: AsyncIterable<Uint8Array> | null;
}

export interface HttpRequestInit {
  method: 'GET';
  headers: Record<string, string>;
  redirect: 'manual' | 'follow';
  signal: AbortSignal;
}

/**
 * HTTP transport used by the gate and the fetcher
 */
export type HttpClient = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

/**
 * Logger accepted by crawl components
 */
export type CrawlLogger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Progress snapshot emitted while crawling
 */
export interface CrawlProgress {
  queued: number;
  inFlight: number;
  visited: number;
  pagesFetched: number;
  pagesFailed: number;
  pagesSkipped: number;
  linksDiscovered: number;
  duplicatesDetected: number;
  depthReached: number;
  elapsedMs: number;
}

/**
 * One HTTP exchange with its body already read
 */
export interface RawResponse {
  url: string;
  status: number;

  /**
   * Response headers, names lower-cased
   */
  headers: Record<string, string>;

  /**
   * Decoded body, null for binary content types
   */
  body: string | null;
  rawBody: Uint8Array;
  byteSize: number;
  truncated: boolean;
  latencyMs: number;
}

/**
 * Result of one logical fetch (retries and redirects resolved). Frozen once produced.
 */
export interface FetchResult {
  readonly url: string;

  /**
   * Normalized identity of the last address reached
   */
  readonly finalUrl: string;

  /**
   * Last address actually requested; relative references resolve against it
   */
  readonly responseUrl: string;

  /**
   * Final HTTP status (null when every attempt failed before a response)
   */
  readonly status: number | null;
  readonly latencyMs: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string | null;

  /**
   * Body bytes as received (up to maxBodyBytes)
   */
  readonly rawBody: Uint8Array | null;
  readonly contentType: string | null;
  readonly byteSize: number;
  readonly truncated: boolean;
  readonly redirectChain: readonly RedirectHop[];
  readonly redirectLoop: boolean;

  /**
   * Redirect target could not be normalized
   */
  readonly malformedRedirect: boolean;

  /**
   * Redirect chain stopped at a target robots.txt disallows
   */
  readonly redirectBlockedByRobots: boolean;
  readonly attempts: number;
  readonly error: string | null;
  readonly errorType: string | null;
}
