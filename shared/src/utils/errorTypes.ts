/**
 * Error Type Definitions
 *
 * Refresh failures are classified as transport (`NetworkError`) or payload
 * (`DecodingError`) problems. Both extend `RefreshError`, which is the only
 * type callers of the cache need to branch on.
 */

export type RefreshErrorKind = 'network' | 'decoding';

/**
 * A failed fetch from the remote data source.
 */
export abstract class RefreshError extends Error {
  abstract readonly kind: RefreshErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transport-level failure: no connection, timeout, or a non-2xx status.
 * `statusCode` is 0 when no response was received.
 */
export class NetworkError extends RefreshError {
  readonly kind = 'network' as const;
  readonly statusCode: number;
  /** Node.js error code (e.g., ECONNREFUSED, ETIMEDOUT) */
  readonly code?: string;

  constructor(message: string, options: { statusCode?: number; code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.statusCode = options.statusCode ?? 0;
    this.code = options.code;
  }

  get isRetryable(): boolean {
    return this.statusCode === 0 || this.statusCode === 429 || this.statusCode >= 500;
  }
}

/**
 * The response arrived but could not be parsed into the expected shape.
 */
export class DecodingError extends RefreshError {
  readonly kind = 'decoding' as const;
  /** Human-readable schema issues, `path: message` */
  readonly issues: string[];

  constructor(message: string, options: { issues?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.issues = options.issues ?? [];
  }
}

/**
 * Invalid cache configuration or misuse of the cache API.
 */
export class CacheConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheConfigError';
  }
}

export function isRefreshError(error: unknown): error is RefreshError {
  return error instanceof RefreshError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isDecodingError(error: unknown): error is DecodingError {
  return error instanceof DecodingError;
}

/**
 * Get the HTTP status code from an error, if available.
 */
export function getStatusCode(error: unknown): number | undefined {
  return isNetworkError(error) ? error.statusCode : undefined;
}

/**
 * Get the error code from an error, if available.
 * Works with any Error that carries a string `code` property.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Normalize anything a fetcher throws into a RefreshError. Unclassified
 * failures are treated as network failures and keep the original as `cause`.
 */
export function toRefreshError(error: unknown): RefreshError {
  if (isRefreshError(error)) {
    return error;
  }
  return new NetworkError(getErrorMessage(error), { code: getErrorCode(error), cause: error });
}

export interface RefreshErrorDescription {
  message: string;
  recoverySuggestion: string;
}

/**
 * User-facing description of a refresh failure.
 */
export function describeRefreshError(error: RefreshError): RefreshErrorDescription {
  if (isDecodingError(error)) {
    return {
      message: 'Received an unexpected response',
      recoverySuggestion: 'Try again or contact support if the problem persists',
    };
  }

  const statusCode = getStatusCode(error) ?? 0;
  if (statusCode === 0) {
    return {
      message: 'No internet connection',
      recoverySuggestion: 'Check your internet connection and try again',
    };
  }
  if (statusCode === 401 || statusCode === 403) {
    return {
      message: 'Please check your permissions',
      recoverySuggestion: 'Sign out and sign back in',
    };
  }
  if (statusCode === 404) {
    return {
      message: 'The requested item was not found',
      recoverySuggestion: 'Refresh the list to see current items',
    };
  }
  if (statusCode >= 500) {
    return {
      message: 'Server is experiencing issues',
      recoverySuggestion: 'Wait a moment and try again',
    };
  }
  return {
    message: 'Network request failed',
    recoverySuggestion: 'Try again or contact support if the problem persists',
  };
}
