/**
 * Error codes used throughout typecensus.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Index lookups
  | 'NotFound'
  | 'TransientNetworkError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'MalformedResponse'
  | 'HttpError'
  // Per-package and batch outcomes
  | 'ResolutionError'
  | 'Cancelled'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all typecensus errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('HttpError', 'Index request failed', {
 *   cause: originalError,
 *   details: { status: 403, url },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage or an argument is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * The package, release or artifact does not exist on the index.
 * This is a definitive answer and is never retried.
 */
export class NotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFound', message, options);
  }
}

/**
 * Connection reset, refused or dropped, or a 5xx-class response.
 */
export class TransientNetworkError extends AppError {
  /** HTTP status when the failure came from a response */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('TransientNetworkError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when rate limited by the index.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when a single request attempt times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * The index answered, but with data that cannot be parsed as expected.
 * Not retryable.
 */
export class MalformedResponseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('MalformedResponse', message, options);
  }
}

/**
 * Non-retryable HTTP failure (4xx other than 404 and 429, oversized downloads).
 */
export class IndexHttpError extends AppError {
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('HttpError', message, options);
    this.status = options.status;
  }
}

/**
 * Terminal failure for one package. Never aborts the rest of a batch.
 */
export class ResolutionError extends AppError {
  /** Name of the package as it was requested */
  public readonly packageName: string;

  constructor(packageName: string, cause: unknown) {
    super('ResolutionError', `Failed to resolve "${packageName}": ${describeError(cause)}`, {
      cause,
    });
    this.packageName = packageName;
  }
}

/**
 * The batch was cancelled before this work was dispatched.
 */
export class CancelledError extends AppError {
  constructor(message = 'Cancelled before dispatch', options: AppErrorOptions = {}) {
    super('Cancelled', message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
