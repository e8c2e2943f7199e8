import type { DistributionArtifact } from '@typecensus/shared';

const SDIST_SUFFIXES = ['.tar.gz', '.tgz', '.zip'];

/**
 * Whether a wheel is pure Python for every platform (`*-none-any.whl`).
 * Compressed tag sets such as `py2.py3-none-any` count.
 */
export function isUniversalWheel(filename: string): boolean {
  const parts = filename.replace(/\.whl$/i, '').split('-');
  if (parts.length < 5) {
    return false;
  }
  const abi = parts[parts.length - 2].split('.');
  const platform = parts[parts.length - 1].split('.');
  return abi.includes('none') && platform.includes('any');
}

function rank(artifact: DistributionArtifact): number | null {
  const filename = artifact.filename.toLowerCase();
  if (artifact.kind === 'wheel') {
    return filename.endsWith('.whl') && isUniversalWheel(filename) ? 0 : 1;
  }
  return SDIST_SUFFIXES.some((suffix) => filename.endsWith(suffix)) ? 2 : null;
}

/**
 * Picks the artifact to inspect: universal wheel, then any other wheel,
 * then a source distribution. Yanked files and unsupported formats are
 * skipped; ties keep index order.
 */
export function selectArtifact(artifacts: DistributionArtifact[]): DistributionArtifact | null {
  let best: { artifact: DistributionArtifact; rank: number } | null = null;
  for (const artifact of artifacts) {
    if (artifact.yanked) {
      continue;
    }
    const artifactRank = rank(artifact);
    if (artifactRank === null) {
      continue;
    }
    if (!best || artifactRank < best.rank) {
      best = { artifact, rank: artifactRank };
    }
  }
  return best?.artifact ?? null;
}
