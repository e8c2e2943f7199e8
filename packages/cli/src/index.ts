#!/usr/bin/env node
import { AppError, ConfigError, UsageError } from '@typecensus/shared';
import { createProgram } from './program';

const program = createProgram();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (e) {
    const opts = program.opts();

    if (opts.json) {
      console.log(
        JSON.stringify({
          error: {
            code: e instanceof AppError ? e.code : 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
            details: e instanceof AppError ? e.details : undefined,
          },
        }),
      );
    } else {
      // Human-readable output
      console.error(`Error: ${(e instanceof Error && e.message) || String(e)}`);
      if (e instanceof AppError && e.details) {
        console.error(
          `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
        );
      }
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      } else {
        console.error(`\nFor more details, run with the --verbose flag.`);
      }
    }

    if (e instanceof ConfigError || e instanceof UsageError) {
      process.exit(2);
    } else {
      process.exit(1);
    }
  }
}

void main();
