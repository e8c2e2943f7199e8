import { z } from 'zod';
import type { ArtifactKind, DistributionArtifact, ReleaseInfo } from '@typecensus/shared';

/**
 * One file of a release in the PyPI JSON API.
 * Only the fields the resolver reads are validated; the rest are stripped.
 */
export const PypiFileSchema = z.object({
  filename: z.string().min(1),
  url: z.string().min(1),
  /** `sdist`, `bdist_wheel`, `bdist_egg`, `bdist_wininst`, ... */
  packagetype: z.string(),
  size: z.number().int().nonnegative().optional(),
  yanked: z.boolean().default(false),
});

export const PypiProjectSchema = z.object({
  info: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  releases: z.record(z.array(PypiFileSchema)).default({}),
  /** Files of `info.version` */
  urls: z.array(PypiFileSchema).default([]),
});

export type PypiFile = z.infer<typeof PypiFileSchema>;
export type PypiProject = z.infer<typeof PypiProjectSchema>;

const PACKAGE_TYPES: Record<string, ArtifactKind> = {
  bdist_wheel: 'wheel',
  sdist: 'sdist',
};

function toArtifacts(files: PypiFile[]): DistributionArtifact[] {
  const artifacts: DistributionArtifact[] = [];
  for (const file of files) {
    const kind = PACKAGE_TYPES[file.packagetype];
    if (!kind) {
      continue;
    }
    artifacts.push({
      filename: file.filename,
      url: file.url,
      kind,
      size: file.size,
      yanked: file.yanked,
    });
  }
  return artifacts;
}

export function toReleaseInfo(project: PypiProject): ReleaseInfo {
  const versions: Record<string, DistributionArtifact[]> = {};
  for (const [version, files] of Object.entries(project.releases)) {
    versions[version] = toArtifacts(files);
  }
  const artifacts = toArtifacts(project.urls);
  if (!(project.info.version in versions)) {
    versions[project.info.version] = artifacts;
  }
  return {
    name: project.info.name,
    version: project.info.version,
    artifacts,
    versions,
  };
}
