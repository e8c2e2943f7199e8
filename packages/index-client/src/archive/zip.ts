import * as yauzl from 'yauzl';
import { AppError, MalformedResponseError, toError, type ArtifactEntry } from '@typecensus/shared';
import { toEntry } from './format';
import { HttpRangeReader, type RangeFetcher } from './range-reader';

function collectEntries(zipfile: yauzl.ZipFile): Promise<ArtifactEntry[]> {
  return new Promise((resolve, reject) => {
    const entries: ArtifactEntry[] = [];
    zipfile.on('entry', (entry: yauzl.Entry) => {
      const isDirectory = entry.fileName.endsWith('/');
      entries.push(toEntry(entry.fileName, entry.uncompressedSize, isDirectory));
      zipfile.readEntry();
    });
    zipfile.once('end', () => resolve(entries));
    zipfile.once('error', (error: unknown) => reject(asZipError(error)));
    zipfile.readEntry();
  });
}

function asZipError(error: unknown): Error {
  // Transport failures from a range reader keep their own type.
  if (error instanceof AppError) {
    return error;
  }
  return new MalformedResponseError(`Unreadable zip archive: ${toError(error).message}`, {
    cause: error,
  });
}

/**
 * Lists the members of a zip archive held in memory.
 */
export async function listZipBuffer(buffer: Buffer): Promise<ArtifactEntry[]> {
  const zipfile = await new Promise<yauzl.ZipFile>((resolve, reject) => {
    yauzl.fromBuffer(buffer, { lazyEntries: true }, (err, opened) => {
      if (err || !opened) {
        reject(asZipError(err));
        return;
      }
      resolve(opened);
    });
  });
  return collectEntries(zipfile);
}

/**
 * Lists the members of a remote zip archive by reading only its central
 * directory through ranged reads.
 *
 * @param size - Total archive size in bytes
 * @param fetchRange - Fetches bytes `[start, end)`
 * @param tailBytes - Bytes fetched from the end of the archive on first read
 */
export async function listZipRemote(
  size: number,
  fetchRange: RangeFetcher,
  tailBytes: number,
): Promise<ArtifactEntry[]> {
  const reader = new HttpRangeReader(size, fetchRange, tailBytes);
  const zipfile = await new Promise<yauzl.ZipFile>((resolve, reject) => {
    yauzl.fromRandomAccessReader(
      reader,
      size,
      { lazyEntries: true, autoClose: true },
      (err, opened) => {
        if (err || !opened) {
          reject(asZipError(err));
          return;
        }
        resolve(opened);
      },
    );
  });
  return collectEntries(zipfile);
}
