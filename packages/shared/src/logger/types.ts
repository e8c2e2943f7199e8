import type { TypecensusEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout typecensus.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log(createEvent(runId, { type: 'BatchStarted', payload: { ... } }));
 *
 * // Standard logging
 * logger.info('Resolved 10 packages');
 * logger.error(new Error('Failed'), 'Listing failed');
 *
 * // Create a child logger with additional context
 * const pkgLogger = logger.child({ pkg: 'requests' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   * @param event - The event to log
   */
  log(event: TypecensusEvent): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}

export function formatBindings(bindings: Record<string, unknown>): string {
  return Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
}

export function withPrefix(bindings: Record<string, unknown>, message: string): string {
  const prefix = formatBindings(bindings);
  return prefix ? `[${prefix}] ${message}` : message;
}
