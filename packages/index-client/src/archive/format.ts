import { MalformedResponseError, type ArtifactEntry } from '@typecensus/shared';

export type ArchiveFormat = 'zip' | 'tar.gz';

/**
 * Archive container of an artifact, from its filename.
 * Wheels are zip files; sdists are `.tar.gz`, `.tgz` or `.zip`.
 */
export function archiveFormat(filename: string): ArchiveFormat {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.whl') || lower.endsWith('.zip')) {
    return 'zip';
  }
  if (lower.endsWith('.tar.gz') || lower.endsWith('.tgz')) {
    return 'tar.gz';
  }
  throw new MalformedResponseError(`Unsupported artifact format: ${filename}`);
}

/**
 * Normalizes an archive member name to a relative `/`-separated path.
 */
export function toEntry(rawPath: string, size: number | undefined, isDirectory: boolean): ArtifactEntry {
  const path = rawPath
    .replace(/\\/g, '/')
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '');
  return isDirectory ? { path, isDirectory } : { path, size, isDirectory };
}
