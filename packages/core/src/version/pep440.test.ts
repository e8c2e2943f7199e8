import { describe, it, expect } from 'vitest';
import { compareVersions, isPrerelease, parseVersion, type Version } from './pep440';

function version(text: string): Version {
  const parsed = parseVersion(text);
  if (!parsed) {
    throw new Error(`Unparseable version in test: ${text}`);
  }
  return parsed;
}

const compareText = (a: string, b: string) => compareVersions(version(a), version(b));

describe('parseVersion', () => {
  it('parses every segment', () => {
    expect(parseVersion('1!2.0.3rc4.post5.dev6+ubuntu.1')).toEqual({
      epoch: 1,
      release: [2, 0, 3],
      pre: { label: 'rc', number: 4 },
      post: 5,
      dev: 6,
      local: ['ubuntu', 1],
    });
  });

  it('normalizes alternative spellings', () => {
    expect(parseVersion('v1.0-ALPHA')).toEqual({ epoch: 0, release: [1, 0], pre: { label: 'a', number: 0 } });
    expect(parseVersion('1.0c2')?.pre).toEqual({ label: 'rc', number: 2 });
    expect(parseVersion('1.0-3')?.post).toBe(3);
    expect(parseVersion('1.0.rev')?.post).toBe(0);
    expect(parseVersion('1.0.dev')?.dev).toBe(0);
  });

  it('rejects legacy versions', () => {
    expect(parseVersion('2004d')).toBeNull();
    expect(parseVersion('')).toBeNull();
    expect(parseVersion('1.0-beta-final')).toBeNull();
  });
});

describe('isPrerelease', () => {
  it.each([
    ['1.0', false],
    ['1.0.post1', false],
    ['1.0a1', true],
    ['1.0rc1', true],
    ['1.0.dev3', true],
    ['1.0.post1.dev0', true],
  ])('%s -> %s', (text, expected) => {
    const version = parseVersion(text);
    expect(version).not.toBeNull();
    expect(version && isPrerelease(version)).toBe(expected);
  });
});

describe('compareVersions', () => {
  it('orders releases the way installers do', () => {
    const ordered = [
      '1.0.dev0',
      '1.0a1',
      '1.0a2.dev1',
      '1.0a2',
      '1.0b1',
      '1.0rc1',
      '1.0',
      '1.0+local.1',
      '1.0.post1.dev0',
      '1.0.post1',
      '1.1',
      '1.10',
      '1!0.1',
    ];
    const shuffled = [...ordered].reverse();

    expect(shuffled.sort(compareText)).toEqual(ordered);
  });

  it('treats trailing zeros as equal', () => {
    expect(compareText('1.0', '1.0.0')).toBe(0);
    expect(compareText('2', '2.0.0.0')).toBe(0);
  });
});
