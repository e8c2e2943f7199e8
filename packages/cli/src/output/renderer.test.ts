import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  CancelledError,
  NotFoundError,
  ResolutionError,
} from '@typecensus/shared';
import type { Outcome } from '@typecensus/core';
import { OutputRenderer, buildReport } from './renderer';

const stripAnsi = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, '');

const outcomes: Outcome[] = [
  { ok: true, record: { package: 'requests', hasPyTyped: false, hasTypesPackage: true } },
  { ok: true, record: { package: 'attrs', hasPyTyped: true, hasTypesPackage: null } },
  { ok: false, error: new ResolutionError('ghost', new NotFoundError('No project named ghost')) },
  {
    ok: false,
    error: new ResolutionError('six', new CancelledError('Deadline of 50ms reached')),
  },
];

describe('buildReport', () => {
  it('maps records to dataset rows and failures to error rows', () => {
    const report = buildReport(outcomes);

    expect(report.results).toEqual([
      { package: 'requests', has_py_typed: false, has_types_package: true },
      { package: 'attrs', has_py_typed: true, has_types_package: null },
      {
        package: 'ghost',
        error: {
          code: 'NotFound',
          message: 'Failed to resolve "ghost": No project named ghost',
        },
      },
      {
        package: 'six',
        error: {
          code: 'Cancelled',
          message: 'Failed to resolve "six": Deadline of 50ms reached',
        },
      },
    ]);
    expect(report.summary).toEqual({ total: 4, resolved: 2, failed: 1, cancelled: 1 });
  });

  it('uses UnknownError for causes outside the taxonomy', () => {
    const report = buildReport([{ ok: false, error: new ResolutionError('x', 'boom') }]);
    expect(report.results[0]).toEqual({
      package: 'x',
      error: { code: 'UnknownError', message: 'Failed to resolve "x": boom' },
    });
  });
});

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    const renderer = new OutputRenderer(true);
    renderer.renderOutcomes(outcomes.slice(0, 1));

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toEqual({
      results: [{ package: 'requests', has_py_typed: false, has_types_package: true }],
      summary: { total: 1, resolved: 1, failed: 0, cancelled: 0 },
    });
  });

  it('renders one aligned line per package and a summary (human)', () => {
    const renderer = new OutputRenderer(false);
    renderer.renderOutcomes(outcomes);

    const lines = logSpy.mock.calls.map((c) => stripAnsi(String(c[0])));
    expect(lines).toEqual([
      '✔ requests  py.typed: no  types-requests: yes',
      '✔ attrs     py.typed: yes  types-attrs: unknown',
      '✖ ghost     No project named ghost',
      '✖ six       Deadline of 50ms reached',
      '\n4 packages: 2 resolved, 1 failed, 1 cancelled',
    ]);
  });

  it('omits empty failure counts from the summary', () => {
    const renderer = new OutputRenderer(false);
    renderer.renderOutcomes([
      { ok: true, record: { package: 'six', hasPyTyped: false, hasTypesPackage: false } },
    ]);

    const lines = logSpy.mock.calls.map((c) => stripAnsi(String(c[0])));
    expect(lines[1]).toBe('\n1 packages: 1 resolved');
  });

  it('describes non-error causes by the resolution message', () => {
    const renderer = new OutputRenderer(false);
    renderer.renderOutcomes([{ ok: false, error: new ResolutionError('x', 'boom') }]);

    const lines = logSpy.mock.calls.map((c) => stripAnsi(String(c[0])));
    expect(lines[0]).toBe('✖ x  Failed to resolve "x": boom');
  });
});
