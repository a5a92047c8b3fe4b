/**
 * Crawl Configuration
 * Validates a seed configuration and freezes it into the session config
 */

import { CrawlConfig, HostCircuitBreakerConfig, SeedConfiguration, TrailingSlashPolicy } from './crawling.types';
import { DEFAULT_NORMALIZE_OPTIONS, tryNormalizeUrl } from './url-normalizer';
import { CheckConfig, DEFAULT_CHECK_CONFIG } from '../checks/check.types';

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid crawl configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: HostCircuitBreakerConfig = {
  enabled: false,
  errorThresholdPercentage: 50,
  resetTimeoutMs: 30000,
  volumeThreshold: 10,
};

export const DEFAULT_CRAWL_OPTIONS = {
  maxDepth: 3,
  maxPages: 500,
  concurrency: 4,
  perHostConcurrency: 2,
  crawlDelayFloorMs: 1000,
  fetchTimeoutMs: 10000,
  timeLimitMs: null,
  userAgent: 'SiteAuditBot/1.0 (+https://example.com/bot)',
  maxRetries: 2,
  retryBaseDelayMs: 500,
  maxRetryDelayMs: 30000,
  retryJitterMs: 0,
  maxRedirects: 10,
  maxBodyBytes: 5 * 1024 * 1024,
  crawlResources: true,
} as const;

const TRAILING_SLASH_POLICIES: readonly TrailingSlashPolicy[] = ['strip', 'add', 'preserve'];

function deepFreeze<T extends object>(value: T): Readonly<T> {
  Object.values(value).forEach((child) => {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  });
  return Object.freeze(value);
}

/**
 * Validate a seed configuration, apply defaults and freeze the result.
 * Every invalid field is reported in one ConfigurationError.
 */
export function createCrawlConfig(seed: SeedConfiguration): CrawlConfig {
  const issues: string[] = [];

  const integer = (name: string, value: number, min: number): number => {
    if (!Number.isInteger(value) || value < min) {
      issues.push(`${name} must be an integer >= ${min} (got ${value})`);
    }
    return value;
  };

  const trailingSlash = seed.trailingSlash ?? DEFAULT_NORMALIZE_OPTIONS.trailingSlash;
  if (!TRAILING_SLASH_POLICIES.includes(trailingSlash)) {
    issues.push(`trailingSlash must be one of ${TRAILING_SLASH_POLICIES.join(', ')} (got ${trailingSlash})`);
  }

  const normalize = {
    trailingSlash,
    stripQueryParams: [...(seed.stripQueryParams ?? DEFAULT_NORMALIZE_OPTIONS.stripQueryParams)],
  };

  let seedUrl = seed.seedUrl;
  if (typeof seed.seedUrl !== 'string' || seed.seedUrl.trim().length === 0) {
    issues.push('seedUrl is required');
  } else {
    const normalized = tryNormalizeUrl(seed.seedUrl, undefined, normalize);
    if (normalized.ok) {
      seedUrl = normalized.url;
    } else {
      issues.push(`seedUrl ${normalized.error.message}`);
    }
  }

  const timeLimitMs = seed.timeLimitMs ? seed.timeLimitMs : null;
  if (timeLimitMs !== null) integer('timeLimitMs', timeLimitMs, 1);

  const fetchTimeoutMs = integer('fetchTimeoutMs', seed.fetchTimeoutMs ?? DEFAULT_CRAWL_OPTIONS.fetchTimeoutMs, 1);

  const blockedPatterns = [...(seed.blockedPatterns ?? [])];
  for (const pattern of blockedPatterns) {
    try {
      new RegExp(pattern);
    } catch {
      issues.push(`blockedPatterns contains an invalid regular expression: ${pattern}`);
    }
  }

  const checks: CheckConfig = { ...DEFAULT_CHECK_CONFIG, ...seed.checks };
  integer('checks.redirectHopLimit', checks.redirectHopLimit, 0);
  integer('checks.titleMinLength', checks.titleMinLength, 0);
  integer('checks.descriptionMinLength', checks.descriptionMinLength, 0);
  if (checks.titleMaxLength < checks.titleMinLength) {
    issues.push('checks.titleMaxLength must be >= checks.titleMinLength');
  }
  if (checks.descriptionMaxLength < checks.descriptionMinLength) {
    issues.push('checks.descriptionMaxLength must be >= checks.descriptionMinLength');
  }

  const circuitBreaker: HostCircuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...seed.circuitBreaker };
  if (circuitBreaker.errorThresholdPercentage <= 0 || circuitBreaker.errorThresholdPercentage > 100) {
    issues.push('circuitBreaker.errorThresholdPercentage must be in (0, 100]');
  }
  integer('circuitBreaker.resetTimeoutMs', circuitBreaker.resetTimeoutMs, 1);
  integer('circuitBreaker.volumeThreshold', circuitBreaker.volumeThreshold, 0);

  const userAgent = (seed.userAgent ?? DEFAULT_CRAWL_OPTIONS.userAgent).trim();
  if (userAgent.length === 0) {
    issues.push('userAgent must not be empty');
  }

  const config: CrawlConfig = {
    seedUrl,
    maxDepth: integer('maxDepth', seed.maxDepth ?? DEFAULT_CRAWL_OPTIONS.maxDepth, 0),
    maxPages: integer('maxPages', seed.maxPages ?? DEFAULT_CRAWL_OPTIONS.maxPages, 1),
    concurrency: integer('concurrency', seed.concurrency ?? DEFAULT_CRAWL_OPTIONS.concurrency, 1),
    perHostConcurrency: integer(
      'perHostConcurrency',
      seed.perHostConcurrency ?? DEFAULT_CRAWL_OPTIONS.perHostConcurrency,
      1
    ),
    crawlDelayFloorMs: integer(
      'crawlDelayFloorMs',
      seed.crawlDelayFloorMs ?? DEFAULT_CRAWL_OPTIONS.crawlDelayFloorMs,
      0
    ),
    fetchTimeoutMs,
    timeLimitMs,
    userAgent,
    normalize,
    maxRetries: integer('maxRetries', seed.maxRetries ?? DEFAULT_CRAWL_OPTIONS.maxRetries, 0),
    retryBaseDelayMs: integer('retryBaseDelayMs', seed.retryBaseDelayMs ?? DEFAULT_CRAWL_OPTIONS.retryBaseDelayMs, 0),
    maxRetryDelayMs: integer('maxRetryDelayMs', seed.maxRetryDelayMs ?? DEFAULT_CRAWL_OPTIONS.maxRetryDelayMs, 0),
    retryJitterMs: integer('retryJitterMs', seed.retryJitterMs ?? DEFAULT_CRAWL_OPTIONS.retryJitterMs, 0),
    maxRedirects: integer('maxRedirects', seed.maxRedirects ?? DEFAULT_CRAWL_OPTIONS.maxRedirects, 0),
    maxBodyBytes: integer('maxBodyBytes', seed.maxBodyBytes ?? DEFAULT_CRAWL_OPTIONS.maxBodyBytes, 1),
    crawlResources: seed.crawlResources ?? DEFAULT_CRAWL_OPTIONS.crawlResources,
    blockedPatterns,
    checks,
    circuitBreaker,
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return deepFreeze(config);
}
