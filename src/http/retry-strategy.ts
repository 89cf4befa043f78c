/**
 * Retry policy for the request layer
 *
 * Exponential backoff over a fixed set of status codes, in the shape of the
 * usual connection-pool retry: the first retry is immediate, each later one
 * waits `backoffFactor * 2^(n-1)` seconds, and a `Retry-After` header wins.
 */

/**
 * Retry configuration
 */
export type RetryPolicy = {
  /** Maximum number of retries (not counting the first attempt) */
  maxRetries: number;
  /** Backoff factor in seconds */
  backoffFactor: number;
  /** Status codes that trigger a retry */
  retryStatusCodes: readonly number[];
};

/** Upper bound for a single backoff, in milliseconds */
export const MAX_BACKOFF_MS = 120_000;

/** Methods retried on a bad status or an interrupted response */
export const IDEMPOTENT_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD', 'PUT', 'DELETE', 'OPTIONS', 'TRACE']);

/** Statuses whose Retry-After header is honoured */
const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([413, 429, 503]);

/** Error codes raised before a request reached the server; safe to retry for any method */
const CONNECT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
]);

/**
 * Calculate the delay before retry number `retryNumber` (1-based)
 *
 * @example
 * ```ts
 * calculateBackoff(1, 0.3); // 0
 * calculateBackoff(2, 0.3); // 600
 * calculateBackoff(3, 0.3); // 1200
 * ```
 */
export function calculateBackoff(retryNumber: number, backoffFactor: number): number {
  if (retryNumber <= 1) {
    return 0;
  }
  const delay = backoffFactor * 1000 * 2 ** (retryNumber - 1);
  return Math.min(Math.round(delay), MAX_BACKOFF_MS);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 *
 * @returns null when the header is absent or unparsable
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, date - now);
}

/**
 * Whether a response status should be retried
 */
export function shouldRetryStatus(method: string, status: number, policy: RetryPolicy): boolean {
  return IDEMPOTENT_METHODS.has(method.toUpperCase()) && policy.retryStatusCodes.includes(status);
}

/**
 * Whether a failed fetch (no response) should be retried
 */
export function shouldRetryNetworkError(method: string, error: unknown): boolean {
  if (IDEMPOTENT_METHODS.has(method.toUpperCase())) {
    return true;
  }
  return CONNECT_ERROR_CODES.has(errorCode(error) ?? '');
}

/**
 * Delay before the next attempt, honouring Retry-After where applicable
 */
export function getRetryDelay(retryNumber: number, policy: RetryPolicy, response?: Response): number {
  if (response && RETRY_AFTER_STATUS_CODES.has(response.status)) {
    const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
    if (retryAfter !== null) {
      return retryAfter;
    }
  }
  return calculateBackoff(retryNumber, policy.backoffFactor);
}

/**
 * Sleep for a specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract the system error code undici attaches as `cause.code`
 */
function errorCode(error: unknown): string | undefined {
  const cause = error instanceof Error ? error.cause : undefined;
  if (cause !== null && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
