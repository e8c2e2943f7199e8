import type { ArtifactEntry, DistributionArtifact, ReleaseInfo } from '@typecensus/shared';
import type { CallOptions } from './types';

/**
 * Read-only view of a package index.
 *
 * Implementations perform one attempt per call and report failures with
 * the shared error taxonomy (`NotFoundError`, `TransientNetworkError`,
 * `RateLimitError`, `MalformedResponseError`, `IndexHttpError`); callers
 * own retries through `executeIndexRequest`.
 *
 * @example
 * ```typescript
 * const release = await executeIndexRequest(ctx, 'project', 'requests', (signal) =>
 *   index.getProject('requests', { signal }),
 * );
 * ```
 */
export interface PackageIndex {
  /**
   * Returns the identifier for this index (used in logs).
   */
  id(): string;
  /**
   * Latest release metadata of a project.
   * @returns `null` when the index definitively has no such project
   */
  getProject(name: string, options?: CallOptions): Promise<ReleaseInfo | null>;
  /**
   * File listing of one artifact.
   */
  listArtifactFiles(artifact: DistributionArtifact, options?: CallOptions): Promise<ArtifactEntry[]>;
  /**
   * Whether a project exists under exactly this name.
   * Resolves `false` only on a definitive not-found answer; any other
   * failure rejects.
   */
  projectExists(name: string, options?: CallOptions): Promise<boolean>;
}
