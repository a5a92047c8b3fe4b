/**
 * Fetch Error Handling
 * Classification of network failures and HTTP statuses with retry guidance
 */

export enum FetchErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  TLS_ERROR = 'TLS_ERROR',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  RATE_LIMITED = 'RATE_LIMITED',
  CLIENT_ERROR = 'CLIENT_ERROR',
  SERVER_ERROR = 'SERVER_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export class FetchError extends Error {
  readonly type: FetchErrorType;
  readonly retryable: boolean;

  constructor(type: FetchErrorType, message: string, retryable: boolean) {
    super(message);
    this.name = 'FetchError';
    this.type = type;
    this.retryable = retryable;
  }
}

export interface RetryDecision {
  type: FetchErrorType;
  retryable: boolean;

  /**
   * Server-provided wait (Retry-After) in milliseconds
   */
  retryAfterMs?: number;
}

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    const causeText =
      cause instanceof Error
        ? ` ${cause.message} ${'code' in cause && typeof cause.code === 'string' ? cause.code : ''}`
        : '';
    return `${error.name} ${error.message}${causeText}`;
  }
  return String(error);
}

/**
 * Classify a thrown transport error (fetch rejections, aborts, socket errors)
 */
export function classifyError(error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const message = errorText(error);

  // Timeout errors (our AbortController fires on timeout)
  if (
    message.includes('AbortError') ||
    message.includes('TimeoutError') ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT') ||
    message.includes('UND_ERR_HEADERS_TIMEOUT') ||
    message.includes('UND_ERR_BODY_TIMEOUT')
  ) {
    return new FetchError(FetchErrorType.TIMEOUT, 'Request timed out', true);
  }

  // TLS / certificate errors
  if (
    message.includes('CERT_') ||
    message.includes('SSL') ||
    message.includes('TLS') ||
    message.includes('self signed certificate') ||
    message.includes('self-signed certificate')
  ) {
    return new FetchError(FetchErrorType.TLS_ERROR, 'TLS handshake failed', true);
  }

  // Network errors
  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    message.includes('EPIPE') ||
    message.includes('UND_ERR_SOCKET') ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return new FetchError(FetchErrorType.NETWORK_ERROR, 'Network connection failed', true);
  }

  return new FetchError(FetchErrorType.UNKNOWN, message || 'Unknown error', true);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Retry guidance for an HTTP status: 5xx and 429 retry, other 4xx are terminal
 */
export function classifyStatus(status: number, retryAfterHeader: string | null = null): RetryDecision | null {
  if (status === 429) {
    return {
      type: FetchErrorType.RATE_LIMITED,
      retryable: true,
      retryAfterMs: parseRetryAfter(retryAfterHeader),
    };
  }

  if (status >= 500) {
    return { type: FetchErrorType.SERVER_ERROR, retryable: true };
  }

  if (status >= 400) {
    return { type: FetchErrorType.CLIENT_ERROR, retryable: false };
  }

  return null;
}

/**
 * Determine if we should retry based on the decision and attempts made
 */
export function shouldRetry(decision: RetryDecision, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount > maxRetries) return false;
  return decision.retryable;
}

/**
 * Calculate retry delay: Retry-After when present, else exponential backoff with jitter
 * `attempt` is the zero-based index of the attempt that just failed.
 */
export function calculateRetryDelay(
  decision: RetryDecision,
  attempt: number,
  options: BackoffOptions
): number {
  if (decision.retryAfterMs !== undefined) {
    return Math.min(decision.retryAfterMs, options.maxDelayMs);
  }

  const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
  const jitter = options.jitterMs > 0 ? Math.random() * options.jitterMs : 0;

  return Math.min(exponentialDelay + jitter, options.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
