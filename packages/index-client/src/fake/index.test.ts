import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  IndexHttpError,
  NotFoundError,
  RateLimitError,
  TransientNetworkError,
} from '@typecensus/shared';
import { FakePackageIndex, parseFakeIndexFixture } from './index';

const fixture = {
  projects: {
    requests: {
      name: 'requests',
      version: '2.32.3',
      releases: {
        '2.31.0': [{ filename: 'requests-2.31.0.tar.gz', files: ['requests-2.31.0/requests/__init__.py'] }],
        '2.32.3': [
          {
            filename: 'requests-2.32.3-py3-none-any.whl',
            files: ['requests/', { path: 'requests/__init__.py', size: 0 }, 'requests/api.py'],
          },
        ],
      },
    },
    'types-requests': {
      releases: { '2.32.0': [{ filename: 'types_requests-2.32.0-py3-none-any.whl' }] },
    },
  },
  failures: [
    { operation: 'exists' as const, target: 'types-six', error: 'transient' as const, times: 2 },
    { operation: 'project' as const, target: 'flaky', error: 'http' as const },
  ],
};

describe('FakePackageIndex', () => {
  it('serves projects by normalized name', async () => {
    const index = new FakePackageIndex(fixture);

    const release = await index.getProject('Requests');

    expect(release?.name).toBe('requests');
    expect(release?.version).toBe('2.32.3');
    expect(release?.artifacts).toEqual([
      {
        filename: 'requests-2.32.3-py3-none-any.whl',
        url: 'fake://requests/requests-2.32.3-py3-none-any.whl',
        kind: 'wheel',
        yanked: false,
      },
    ]);
    expect(release?.versions['2.31.0'][0].kind).toBe('sdist');
  });

  it('defaults the latest version to the last listed release', async () => {
    const release = await new FakePackageIndex(fixture).getProject('types_requests');

    expect(release?.name).toBe('types-requests');
    expect(release?.version).toBe('2.32.0');
  });

  it('returns null for unknown projects', async () => {
    await expect(new FakePackageIndex(fixture).getProject('nonexistent-pkg-xyz')).resolves.toBeNull();
  });

  it('lists artifact files', async () => {
    const index = new FakePackageIndex(fixture);
    const release = await index.getProject('requests');
    const [wheel] = release?.artifacts ?? [];

    const entries = await index.listArtifactFiles(wheel);

    expect(entries).toEqual([
      { path: 'requests', isDirectory: true },
      { path: 'requests/__init__.py', size: 0, isDirectory: false },
      { path: 'requests/api.py', size: undefined, isDirectory: false },
    ]);
  });

  it('rejects listings of unknown artifacts', async () => {
    const index = new FakePackageIndex(fixture);

    await expect(
      index.listArtifactFiles({
        filename: 'other-1.0.tar.gz',
        url: 'fake://other/other-1.0.tar.gz',
        kind: 'sdist',
        yanked: false,
      }),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('answers existence checks', async () => {
    const index = new FakePackageIndex(fixture);

    await expect(index.projectExists('types-requests')).resolves.toBe(true);
    await expect(index.projectExists('types-urllib3')).resolves.toBe(false);
  });

  it('fails scripted calls the given number of times', async () => {
    const index = new FakePackageIndex(fixture);

    await expect(index.projectExists('types-six')).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(index.projectExists('types-six')).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(index.projectExists('types-six')).resolves.toBe(false);
    expect(index.callsFor('exists', 'types-six')).toHaveLength(3);
  });

  it('fails every call when no count is given', async () => {
    const index = new FakePackageIndex(fixture);

    for (let i = 0; i < 4; i++) {
      await expect(index.getProject('flaky')).rejects.toBeInstanceOf(IndexHttpError);
    }
  });

  it('maps rate limits to an immediate retry hint', async () => {
    const index = new FakePackageIndex({
      failures: [{ operation: 'project', target: 'busy', error: 'ratelimit', times: 1 }],
    });

    const error = await index.getProject('busy').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 0 });
    await expect(index.getProject('busy')).resolves.toBeNull();
  });

  it('honours an aborted signal before answering', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(
      new FakePackageIndex(fixture).getProject('requests', { signal: controller.signal }),
    ).rejects.toThrow('stop');
  });

  it('records calls in order', async () => {
    const index = new FakePackageIndex(fixture);
    await index.getProject('requests');
    await index.projectExists('types-requests');

    expect(index.calls).toEqual([
      { operation: 'project', target: 'requests' },
      { operation: 'exists', target: 'types-requests' },
    ]);
  });
});

describe('parseFakeIndexFixture', () => {
  it('applies defaults', () => {
    expect(parseFakeIndexFixture({})).toEqual({ projects: {}, failures: [], latencyMs: 0 });
  });

  it('lists every problem in a ConfigError', () => {
    const run = () =>
      parseFakeIndexFixture(
        { failures: [{ operation: 'delete', target: 'x', error: 'transient' }], latencyMs: -1 },
        'index.json',
      );

    expect(run).toThrow(ConfigError);
    expect(run).toThrow(/Invalid index fixture in index\.json:\n- failures\.0\.operation: .*\n- latencyMs: /);
  });
});
