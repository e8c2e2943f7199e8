import type { Logger } from '@typecensus/shared';

/**
 * Configuration options for retry behavior on transient failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 5,        // More attempts for a flaky mirror
 *   initialDelayMs: 2000, // Start with longer delay for rate-limited indexes
 *   maxDelayMs: 30000,    // Allow longer waits
 *   backoffFactor: 1.5,   // Gentler exponential growth
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
  /** Spread delays by +/- 10%. Default: true */
  jitter?: boolean;
}

/**
 * Waits for `ms` milliseconds. Injected so tests can observe backoff
 * without real delays.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Context passed to every index request.
 * Provides access to logging, cancellation, and retry configuration.
 */
export interface RequestContext {
  /** Identifier of the current resolver run */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Aborts the request outright; never retried */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for one attempt */
  timeoutMs?: number;
  /** Retry configuration for transient failures */
  retryOptions?: RetryOptions;
  /** Backoff clock. Default: `setTimeout` */
  sleep?: Sleep;
}

/**
 * Options accepted by a single index call.
 */
export interface CallOptions {
  signal?: AbortSignal;
}
