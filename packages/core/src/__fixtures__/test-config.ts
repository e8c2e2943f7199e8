import { ConfigSchema, type Config, type Logger, type TypecensusEvent } from '@typecensus/shared';
import type { FakeIndexFixture } from '@typecensus/index-client';

export const minimalConfigForTest: Config = ConfigSchema.parse({
  retry: { maxRetries: 2, initialDelayMs: 0, maxDelayMs: 0 },
  resolver: { concurrency: 2 },
});

export interface RecordingLogger extends Logger {
  events: TypecensusEvent[];
  lines: { level: 'debug' | 'info' | 'warn' | 'error'; message: string }[];
}

/** Logger that keeps everything in memory for assertions. */
export function recordingLogger(): RecordingLogger {
  const logger: RecordingLogger = {
    events: [],
    lines: [],
    log: (event) => {
      logger.events.push(event);
    },
    debug: (message) => {
      logger.lines.push({ level: 'debug', message });
    },
    info: (message) => {
      logger.lines.push({ level: 'info', message });
    },
    warn: (message) => {
      logger.lines.push({ level: 'warn', message });
    },
    error: (error, message) => {
      logger.lines.push({ level: 'error', message: message ?? error.message });
    },
    child: () => logger,
  };
  return logger;
}

/**
 * A small index: `requests` ships no marker but has stubs, `attrs` is
 * typed, `demo` has a typed stable release and an untyped pre-release.
 */
export const sampleIndex: FakeIndexFixture = {
  projects: {
    requests: {
      version: '2.32.3',
      releases: {
        '2.32.3': [
          {
            filename: 'requests-2.32.3-py3-none-any.whl',
            files: ['requests/__init__.py', 'requests/api.py', 'requests-2.32.3.dist-info/RECORD'],
          },
          { filename: 'requests-2.32.3.tar.gz', files: ['requests-2.32.3/setup.py'] },
        ],
      },
    },
    'types-requests': {
      releases: { '2.32.0.20240914': [{ filename: 'types_requests-2.32.0.20240914-py3-none-any.whl' }] },
    },
    attrs: {
      version: '24.2.0',
      releases: {
        '24.2.0': [
          {
            filename: 'attrs-24.2.0-py3-none-any.whl',
            files: ['attr/__init__.py', 'attr/py.typed', 'attrs/__init__.py', 'attrs/py.typed'],
          },
        ],
      },
    },
    demo: {
      version: '2.0b1',
      releases: {
        '1.0': [
          {
            filename: 'demo-1.0.tar.gz',
            files: ['demo-1.0/setup.py', 'demo-1.0/src/demo/__init__.py', 'demo-1.0/src/demo/py.typed'],
          },
        ],
        '2.0b1': [{ filename: 'demo-2.0b1-py3-none-any.whl', files: ['demo/__init__.py'] }],
      },
    },
    abandoned: {
      version: '0.1',
      releases: {
        '0.1': [{ filename: 'abandoned-0.1-py3-none-any.whl', yanked: true, files: ['abandoned/py.typed'] }],
      },
    },
  },
};
