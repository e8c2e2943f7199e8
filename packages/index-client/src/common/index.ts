import {
  createEvent,
  describeError,
  MalformedResponseError,
  NotFoundError,
  IndexHttpError,
  RateLimitError,
  TimeoutError,
  TransientNetworkError,
} from '@typecensus/shared';
import { RequestContext, RetryOptions, Sleep } from '../types';

/**
 * Default retry options for index requests.
 *
 * ## Retry Strategy
 *
 * The retry mechanism uses exponential backoff with jitter to handle transient
 * failures when talking to the package index:
 *
 * - **maxRetries**: Maximum number of retry attempts (default: 3)
 * - **initialDelayMs**: Starting delay between retries (default: 1000ms)
 * - **maxDelayMs**: Cap on delay to prevent excessive waits (default: 10000ms)
 * - **backoffFactor**: Multiplier for exponential growth (default: 2x)
 *
 * ## Retriable Errors
 *
 * - `TransientNetworkError` (connection failures, HTTP 5xx)
 * - `RateLimitError` (HTTP 429); waits at least `retryAfter` seconds, up to `maxDelayMs`
 * - `TimeoutError`
 * - Raw errors carrying status 429/5xx or codes ETIMEDOUT, ECONNRESET,
 *   ECONNREFUSED, UND_ERR_SOCKET
 *
 * ## Non-Retriable Errors
 *
 * - `NotFoundError` (a definitive answer)
 * - `MalformedResponseError`
 * - `IndexHttpError` (HTTP 4xx other than 404 and 429)
 * - Abort signals (user cancellation)
 *
 * ## Delay Calculation
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * (backoffFactor ^ (attempt - 1)))
 * jitter = delay * 0.1 * random(-1, 1)  // +/- 10%
 * finalDelay = max(0, delay + jitter, min(maxDelayMs, retryAfter * 1000))
 * ```
 *
 * @see RetryOptions for customization
 */
export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
  jitter: true,
};

const RETRIABLE_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'UND_ERR_SOCKET']);

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function codeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return codeOf(error.cause);
  }
  return undefined;
}

/**
 * Determines if an error is safe to retry.
 *
 * @param error - The caught error to evaluate
 * @returns true if the error is transient and retry is appropriate
 */
export function isRetriableError(error: unknown): boolean {
  if (
    error instanceof TransientNetworkError ||
    error instanceof RateLimitError ||
    error instanceof TimeoutError
  ) {
    return true;
  }

  if (
    error instanceof NotFoundError ||
    error instanceof MalformedResponseError ||
    error instanceof IndexHttpError
  ) {
    return false;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = codeOf(error);
  return code !== undefined && RETRIABLE_CODES.has(code);
}

/**
 * Backoff delay before retry number `attempt` (1-based).
 */
export function computeBackoffDelay(
  attempt: number,
  options: Required<RetryOptions>,
  error?: unknown,
  random: () => number = Math.random,
): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
  );
  const jitter = options.jitter ? delay * 0.1 * (random() * 2 - 1) : 0;
  const retryAfterMs =
    error instanceof RateLimitError && error.retryAfter !== undefined
      ? Math.min(options.maxDelayMs, error.retryAfter * 1000)
      : 0;
  return Math.max(0, delay + jitter, retryAfterMs);
}

/**
 * Executes an index request with automatic retry, timeout, and abort handling.
 *
 * This is the entry point for every index call. It wraps the actual request
 * with retry logic, a per-attempt timeout, and event logging.
 *
 * ## Usage
 *
 * ```typescript
 * const exists = await executeIndexRequest(
 *   ctx,
 *   'exists',
 *   'types-requests',
 *   (signal) => index.projectExists('types-requests', { signal }),
 *   { maxRetries: 5 }, // Optional override
 * );
 * ```
 */
export async function executeIndexRequest<T>(
  ctx: RequestContext,
  operation: string,
  target: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_RETRY_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };
  const sleep = ctx.sleep ?? defaultSleep;

  const startTime = Date.now();

  await ctx.logger.log(
    createEvent(ctx.runId, {
      type: 'IndexRequestStarted',
      payload: { operation, target },
    }),
  );

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const abortController = new AbortController();

    // Handle user cancellation
    const abortHandler = () => {
      abortController.abort(ctx.abortSignal?.reason);
    };

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort(ctx.abortSignal.reason);
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    // Handle timeout
    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      await ctx.logger.log(
        createEvent(ctx.runId, {
          type: 'IndexRequestFinished',
          payload: {
            operation,
            target,
            durationMs: Date.now() - startTime,
            success: true,
            retries: attempts,
          },
        }),
      );

      return result;
    } catch (error: unknown) {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);

      const timeoutReason: unknown = abortController.signal.reason;
      lastError =
        timeoutReason instanceof TimeoutError && !(error instanceof TimeoutError)
          ? new TimeoutError(timeoutReason.message, { cause: error })
          : error;

      // Don't retry if aborted by user
      if (ctx.abortSignal?.aborted) {
        throw lastError;
      }

      if (!isRetriableError(lastError) || attempts >= options.maxRetries) {
        break;
      }

      attempts++;
      const delay = computeBackoffDelay(attempts, options, lastError);
      await ctx.logger.debug(
        `${operation} ${target}: attempt ${attempts} failed (${describeError(lastError)}), retrying in ${Math.round(delay)}ms`,
      );
      await sleep(delay);
    }
  }

  await ctx.logger.log(
    createEvent(ctx.runId, {
      type: 'IndexRequestFinished',
      payload: {
        operation,
        target,
        durationMs: Date.now() - startTime,
        success: false,
        error: describeError(lastError),
        retries: attempts,
      },
    }),
  );

  throw lastError;
}
