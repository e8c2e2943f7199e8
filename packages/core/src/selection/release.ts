import type { DistributionArtifact, ReleaseInfo, ReleasePolicy } from '@typecensus/shared';
import { compareVersions, isPrerelease, parseVersion, type Version } from '../version/pep440';

export interface SelectedRelease {
  version: string;
  artifacts: DistributionArtifact[];
}

/**
 * Picks the release whose artifacts are inspected.
 *
 * - `index-latest`: the version the index reports as latest.
 * - `latest-stable`: highest final or post release with a non-yanked artifact.
 * - `latest-any`: highest release with a non-yanked artifact, pre-releases included.
 *
 * Returns `null` when no release qualifies.
 */
export function selectRelease(info: ReleaseInfo, policy: ReleasePolicy): SelectedRelease | null {
  if (policy === 'index-latest') {
    return { version: info.version, artifacts: info.artifacts };
  }

  let best: { version: string; parsed: Version; artifacts: DistributionArtifact[] } | null = null;
  for (const [version, artifacts] of Object.entries(info.versions)) {
    const parsed = parseVersion(version);
    if (!parsed || !artifacts.some((artifact) => !artifact.yanked)) {
      continue;
    }
    if (policy === 'latest-stable' && isPrerelease(parsed)) {
      continue;
    }
    if (!best || compareVersions(parsed, best.parsed) > 0) {
      best = { version, parsed, artifacts };
    }
  }
  return best ? { version: best.version, artifacts: best.artifacts } : null;
}
