import { BROWSER_USER_AGENT } from '../config/config-defaults.js';
import { errorMessage, HttpStatusError, NetworkError, TimeoutError } from '../errors/custom-errors.js';
import {
  getRetryDelay,
  type RetryPolicy,
  shouldRetryNetworkError,
  shouldRetryStatus,
  sleep as defaultSleep,
} from './retry-strategy.js';

export type HttpClientOptions = RetryPolicy & {
  /** Time limit for each individual attempt */
  timeoutMs: number;
  /** Sent on every request unless overridden */
  userAgent?: string;
  /** Replaceable transport */
  fetch?: typeof fetch;
  /** Replaceable sleep */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each retry */
  onRetry?: (info: RetryInfo) => void;
};

export type RetryInfo = {
  url: string;
  method: string;
  retryNumber: number;
  delayMs: number;
  reason: string;
};

export type RequestOptions = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
};

/**
 * Shared request layer: one instance per process, read-only after creation
 */
export type HttpClient = {
  request(url: string, options?: RequestOptions): Promise<Response>;
  get(url: string, headers?: Record<string, string>): Promise<Response>;
  postJson(url: string, payload: unknown, headers?: Record<string, string>): Promise<Response>;
};

/**
 * Build an HTTP client with bounded retries and a per-request timeout.
 *
 * Statuses in `retryStatusCodes` are retried for idempotent methods only.
 * Connection failures are retried; a timed-out attempt is not.
 * When retries run out on a bad status, the last response is returned.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const fetchImpl = options.fetch ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const userAgent = options.userAgent ?? BROWSER_USER_AGENT;

  async function attempt(url: string, method: string, init: RequestOptions): Promise<Response> {
    try {
      return await fetchImpl(url, {
        method,
        headers: { 'User-Agent': userAgent, ...init.headers },
        body: init.body,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TimeoutError(`Request to ${url} timed out after ${options.timeoutMs}ms`, url, options.timeoutMs);
      }
      throw new NetworkError(`Request to ${url} failed: ${describeFetchError(error)}`, url, error);
    }
  }

  async function request(url: string, init: RequestOptions = {}): Promise<Response> {
    const method = (init.method ?? 'GET').toUpperCase();

    for (let retryNumber = 1; ; retryNumber++) {
      const canRetry = retryNumber <= options.maxRetries;
      let response: Response;

      try {
        response = await attempt(url, method, init);
      } catch (error) {
        if (!(error instanceof NetworkError) || !canRetry || !shouldRetryNetworkError(method, error.cause)) {
          throw error;
        }
        const delayMs = getRetryDelay(retryNumber, options);
        options.onRetry?.({ url, method, retryNumber, delayMs, reason: error.message });
        await sleep(delayMs);
        continue;
      }

      if (!canRetry || !shouldRetryStatus(method, response.status, options)) {
        return response;
      }

      const delayMs = getRetryDelay(retryNumber, options, response);
      options.onRetry?.({ url, method, retryNumber, delayMs, reason: `HTTP ${response.status}` });
      await response.body?.cancel();
      await sleep(delayMs);
    }
  }

  return {
    request,
    get: (url, headers) => request(url, { method: 'GET', headers }),
    postJson: (url, payload, headers) =>
      request(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(payload),
      }),
  };
}

/**
 * Throw HttpStatusError unless the response status is 2xx
 */
export function raiseForStatus(response: Response, url: string): Response {
  if (!response.ok) {
    const reason = response.statusText ? ` ${response.statusText}` : '';
    throw new HttpStatusError(`HTTP ${response.status}${reason} for url: ${url}`, url, response.status);
  }
  return response;
}

/**
 * Read a response body, reporting interrupted transfers as NetworkError
 */
export async function readText(response: Response, url: string): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new NetworkError(`Failed to read response from ${url}: ${describeFetchError(error)}`, url, error);
  }
}

function describeFetchError(error: unknown): string {
  const message = errorMessage(error);
  const cause = error instanceof Error ? error.cause : undefined;
  return cause instanceof Error ? `${message} (${cause.message})` : message;
}
