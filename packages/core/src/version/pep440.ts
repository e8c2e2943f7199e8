/**
 * Version parsing and ordering for PyPI release strings (PEP 440).
 */

export type PreReleaseLabel = 'a' | 'b' | 'rc';

export interface Version {
  epoch: number;
  release: number[];
  pre?: { label: PreReleaseLabel; number: number };
  post?: number;
  dev?: number;
  local?: (number | string)[];
}

const VERSION_PATTERN = new RegExp(
  '^\\s*v?' +
    '(?:(?<epoch>\\d+)!)?' +
    '(?<release>\\d+(?:\\.\\d+)*)' +
    '(?:[-_.]?(?<preLabel>alpha|beta|preview|pre|rc|a|b|c)[-_.]?(?<preNumber>\\d+)?)?' +
    '(?:-(?<postImplicit>\\d+)|[-_.]?(?:post|rev|r)[-_.]?(?<postNumber>\\d+)?(?<postLabel>))?' +
    '(?:[-_.]?dev[-_.]?(?<devNumber>\\d+)?(?<devLabel>))?' +
    '(?:\\+(?<local>[a-z0-9]+(?:[-_.][a-z0-9]+)*))?' +
    '\\s*$',
  'i',
);

const PRE_LABELS: Record<string, PreReleaseLabel> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  c: 'rc',
  rc: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const PRE_RANK: Record<PreReleaseLabel, number> = { a: 0, b: 1, rc: 2 };

/**
 * Parses a version string. Returns `null` for strings that are not valid
 * PEP 440 versions (legacy versions such as `2004d`).
 */
export function parseVersion(text: string): Version | null {
  const match = VERSION_PATTERN.exec(text);
  const groups = match?.groups;
  if (!groups) {
    return null;
  }

  const version: Version = {
    epoch: groups.epoch ? Number(groups.epoch) : 0,
    release: groups.release.split('.').map(Number),
  };

  if (groups.preLabel) {
    version.pre = {
      label: PRE_LABELS[groups.preLabel.toLowerCase()],
      number: Number(groups.preNumber ?? 0),
    };
  }
  if (groups.postImplicit !== undefined) {
    version.post = Number(groups.postImplicit);
  } else if (groups.postLabel !== undefined) {
    version.post = Number(groups.postNumber ?? 0);
  }
  if (groups.devLabel !== undefined) {
    version.dev = Number(groups.devNumber ?? 0);
  }
  if (groups.local) {
    version.local = groups.local
      .toLowerCase()
      .split(/[-_.]/)
      .map((part) => (/^\d+$/.test(part) ? Number(part) : part));
  }
  return version;
}

export function isPrerelease(version: Version): boolean {
  return version.pre !== undefined || version.dev !== undefined;
}

function compareNumbers(a: number, b: number): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

function trimTrailingZeros(release: number[]): number[] {
  let end = release.length;
  while (end > 1 && release[end - 1] === 0) {
    end--;
  }
  return release.slice(0, end);
}

function compareRelease(a: number[], b: number[]): number {
  const left = trimTrailingZeros(a);
  const right = trimTrailingZeros(b);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = compareNumbers(left[i] ?? 0, right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/** `1.0.dev0 < 1.0a1 < 1.0rc1 < 1.0 < 1.0.post1` */
function preKey(version: Version): [number, number] {
  if (version.pre) {
    return [PRE_RANK[version.pre.label], version.pre.number];
  }
  if (version.post === undefined && version.dev !== undefined) {
    return [-Infinity, 0];
  }
  return [Infinity, 0];
}

function compareLocal(a: Version['local'], b: Version['local']): number {
  if (!a || !b) {
    return compareNumbers(a ? 1 : 0, b ? 1 : 0);
  }
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) {
      return left === undefined ? -1 : 1;
    }
    if (typeof left === 'number' && typeof right === 'number') {
      const diff = compareNumbers(left, right);
      if (diff !== 0) {
        return diff;
      }
    } else if (typeof left === 'number' || typeof right === 'number') {
      // Numeric segments sort after alphanumeric ones.
      return typeof left === 'number' ? 1 : -1;
    } else if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return 0;
}

export function compareVersions(a: Version, b: Version): number {
  const [aPreRank, aPreNumber] = preKey(a);
  const [bPreRank, bPreNumber] = preKey(b);
  return (
    compareNumbers(a.epoch, b.epoch) ||
    compareRelease(a.release, b.release) ||
    compareNumbers(aPreRank, bPreRank) ||
    compareNumbers(aPreNumber, bPreNumber) ||
    compareNumbers(a.post ?? -Infinity, b.post ?? -Infinity) ||
    compareNumbers(a.dev ?? Infinity, b.dev ?? Infinity) ||
    compareLocal(a.local, b.local)
  );
}
