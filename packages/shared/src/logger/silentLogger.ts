import type { Logger } from './types';

/**
 * Discards everything. Used where a caller supplies no logger.
 */
export class SilentLogger implements Logger {
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
