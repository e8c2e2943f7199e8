import { describe, it, expect } from 'vitest';
import type { DistributionArtifact, ReleaseInfo } from '@typecensus/shared';
import { isUniversalWheel, selectArtifact, selectRelease } from './index';

function artifact(filename: string, extra: Partial<DistributionArtifact> = {}): DistributionArtifact {
  return {
    filename,
    url: `https://files.test/${filename}`,
    kind: filename.endsWith('.whl') ? 'wheel' : 'sdist',
    yanked: false,
    ...extra,
  };
}

const info: ReleaseInfo = {
  name: 'demo',
  version: '1.5',
  artifacts: [artifact('demo-1.5.tar.gz')],
  versions: {
    '1.5': [artifact('demo-1.5.tar.gz')],
    '2.0': [artifact('demo-2.0.tar.gz', { yanked: true })],
    '1.9': [artifact('demo-1.9-py3-none-any.whl')],
    '2.1rc1': [artifact('demo-2.1rc1-py3-none-any.whl')],
    'not-a-version': [artifact('demo-legacy.tar.gz')],
  },
};

describe('selectRelease', () => {
  it('uses the index-reported version by default policy', () => {
    expect(selectRelease(info, 'index-latest')).toEqual({
      version: '1.5',
      artifacts: info.artifacts,
    });
  });

  it('picks the highest stable release with a usable artifact', () => {
    expect(selectRelease(info, 'latest-stable')?.version).toBe('1.9');
  });

  it('includes pre-releases under latest-any', () => {
    expect(selectRelease(info, 'latest-any')?.version).toBe('2.1rc1');
  });

  it('returns null when nothing qualifies', () => {
    const onlyPre: ReleaseInfo = {
      name: 'early',
      version: '0.1a1',
      artifacts: [],
      versions: { '0.1a1': [artifact('early-0.1a1.tar.gz')] },
    };
    expect(selectRelease(onlyPre, 'latest-stable')).toBeNull();
    expect(selectRelease(onlyPre, 'latest-any')?.version).toBe('0.1a1');
  });
});

describe('isUniversalWheel', () => {
  it.each([
    ['six-1.16.0-py2.py3-none-any.whl', true],
    ['attrs-24.2.0-1-py3-none-any.whl', true],
    ['numpy-2.0.0-cp312-cp312-manylinux_2_17_x86_64.whl', false],
    ['cffi-1.17.0-cp312-abi3-any.whl', false],
    ['broken.whl', false],
  ])('%s -> %s', (filename, expected) => {
    expect(isUniversalWheel(filename)).toBe(expected);
  });
});

describe('selectArtifact', () => {
  it('prefers a universal wheel over platform wheels and sdists', () => {
    const chosen = selectArtifact([
      artifact('demo-1.0.tar.gz'),
      artifact('demo-1.0-cp312-cp312-win_amd64.whl'),
      artifact('demo-1.0-py3-none-any.whl'),
    ]);
    expect(chosen?.filename).toBe('demo-1.0-py3-none-any.whl');
  });

  it('falls back to a platform wheel, then to an sdist', () => {
    expect(
      selectArtifact([artifact('demo-1.0.zip'), artifact('demo-1.0-cp312-cp312-win_amd64.whl')])
        ?.filename,
    ).toBe('demo-1.0-cp312-cp312-win_amd64.whl');
    expect(selectArtifact([artifact('demo-1.0.zip')])?.filename).toBe('demo-1.0.zip');
  });

  it('keeps index order among equals', () => {
    expect(
      selectArtifact([artifact('demo-1.0.tar.gz'), artifact('demo-1.0.zip')])?.filename,
    ).toBe('demo-1.0.tar.gz');
  });

  it('skips yanked files and unsupported formats', () => {
    expect(
      selectArtifact([
        artifact('demo-1.0-py3-none-any.whl', { yanked: true }),
        artifact('demo-1.0.tar.bz2'),
      ]),
    ).toBeNull();
    expect(selectArtifact([])).toBeNull();
  });
});
