import type { TypecensusEvent } from '../types/events';
import { redact } from '../redaction';
import { withPrefix, type Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug lines and raw events. Default: false */
  verbose?: boolean;
}

/**
 * Logs to stderr so stdout carries only command output.
 */
export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;

  constructor(
    options: ConsoleLoggerOptions = {},
    private readonly bindings: Record<string, unknown> = {},
  ) {
    this.verbose = options.verbose ?? false;
  }

  log(event: TypecensusEvent): void {
    if (this.verbose) {
      console.error(JSON.stringify(redact(event)));
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(withPrefix(this.bindings, message));
    }
  }

  info(message: string): void {
    console.error(withPrefix(this.bindings, message));
  }

  warn(message: string): void {
    console.error(withPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(withPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ verbose: this.verbose }, { ...this.bindings, ...bindings });
  }
}
