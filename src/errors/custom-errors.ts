/**
 * Base error class for submeta-dl
 */
export class SubmetaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubmetaError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends SubmetaError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Connection-level failure (DNS, refused connection, reset socket)
 */
export class NetworkError extends SubmetaError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NetworkError';
  }
}

/**
 * Non-2xx response
 */
export class HttpStatusError extends SubmetaError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

/**
 * A single request exceeded its time limit
 */
export class TimeoutError extends SubmetaError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Missing or malformed data in a page or API payload
 */
export class ParseError extends SubmetaError {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Platform error entry as returned by the API
 */
export type ApiErrorEntry = {
  key?: string | null;
  message: string;
};

/**
 * Authentication or authorization failure
 */
export class AuthError extends SubmetaError {
  constructor(
    message: string,
    public readonly errors: ApiErrorEntry[] = [],
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

/**
 * Download error
 */
export class DownloadError extends SubmetaError {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * Union of errors produced by the request layer
 */
export type TransportError = NetworkError | HttpStatusError | TimeoutError;

/**
 * Check whether an error came from the request layer
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof NetworkError || error instanceof HttpStatusError || error instanceof TimeoutError;
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
