import * as fs from 'fs/promises';
import type { TypecensusEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';

/**
 * Appends redacted events to a JSON Lines file and forwards plain
 * messages to another logger.
 */
export class JsonlLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly delegate: Logger,
  ) {}

  async log(event: TypecensusEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A failed write never fails the caller.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
    await this.delegate.log(event);
  }

  debug(message: string) {
    return this.delegate.debug(message);
  }

  info(message: string) {
    return this.delegate.info(message);
  }

  warn(message: string) {
    return this.delegate.warn(message);
  }

  error(error: Error, message?: string) {
    return this.delegate.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, this.delegate.child(bindings));
  }
}
