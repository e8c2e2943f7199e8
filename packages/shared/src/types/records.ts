/**
 * Build kind of a distribution artifact.
 * Wheels are built archives; sdists are source archives.
 */
export type ArtifactKind = 'wheel' | 'sdist';

/**
 * An installable archive published for one release.
 */
export interface DistributionArtifact {
  filename: string;
  url: string;
  kind: ArtifactKind;
  /** Size in bytes, as reported by the index */
  size?: number;
  /** Yanked files are never selected */
  yanked: boolean;
}

/**
 * One entry of an artifact's file listing.
 */
export interface ArtifactEntry {
  /** Path inside the archive, `/`-separated, without a leading slash */
  path: string;
  /** Uncompressed size in bytes, when the archive format records it */
  size?: number;
  isDirectory: boolean;
}

/**
 * Release metadata for one project as reported by the index.
 */
export interface ReleaseInfo {
  /** Project name as displayed by the index */
  name: string;
  /** Version the index reports as latest */
  version: string;
  /** Artifacts of `version` */
  artifacts: DistributionArtifact[];
  /** Every published version with its artifacts */
  versions: Record<string, DistributionArtifact[]>;
}

/**
 * Result of looking up the stub-only counterpart of a package.
 * `exists` is `null` when the lookup failed without a definitive answer.
 */
export interface StubPackageQuery {
  queriedName: string;
  exists: boolean | null;
}

/**
 * Typing status of one package, one row of the published dataset.
 */
export interface PackageRecord {
  /** Normalized package name */
  package: string;
  hasPyTyped: boolean;
  /** `null` encodes unknown; never used for a confirmed absence */
  hasTypesPackage: boolean | null;
}

/**
 * Column layout of a dataset row.
 */
export interface PackageRecordRow {
  package: string;
  has_py_typed: boolean;
  has_types_package: boolean | null;
}

export function toRecordRow(record: PackageRecord): PackageRecordRow {
  return {
    package: record.package,
    has_py_typed: record.hasPyTyped,
    has_types_package: record.hasTypesPackage,
  };
}
