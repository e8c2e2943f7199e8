import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEvent, EVENT_SCHEMA_VERSION } from './events';

describe('createEvent', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stamps metadata around the payload', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));

    const event = createEvent('run-9', {
      type: 'PackageResolved',
      payload: {
        index: 1,
        total: 3,
        package: 'attrs',
        hasPyTyped: true,
        hasTypesPackage: false,
        durationMs: 5,
      },
    });

    expect(event).toEqual({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: '2026-03-01T12:00:00.000Z',
      runId: 'run-9',
      type: 'PackageResolved',
      payload: {
        index: 1,
        total: 3,
        package: 'attrs',
        hasPyTyped: true,
        hasTypesPackage: false,
        durationMs: 5,
      },
    });
  });
});
