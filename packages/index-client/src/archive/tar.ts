import { createGunzip } from 'zlib';
import * as tar from 'tar-stream';
import { MalformedResponseError, toError, type ArtifactEntry } from '@typecensus/shared';
import { toEntry } from './format';

const LISTED_TYPES = new Set(['file', 'contiguous-file', 'directory']);

/**
 * Lists the members of a gzip-compressed tar archive held in memory.
 * File bodies are drained, never buffered.
 */
export function listTarGz(buffer: Buffer): Promise<ArtifactEntry[]> {
  return new Promise((resolve, reject) => {
    const entries: ArtifactEntry[] = [];
    const fail = (error: unknown) => {
      reject(
        new MalformedResponseError(`Unreadable tar.gz archive: ${toError(error).message}`, {
          cause: error,
        }),
      );
    };

    const extract = tar.extract();
    extract.on('entry', (header, stream, next) => {
      const type = header.type ?? 'file';
      if (LISTED_TYPES.has(type)) {
        entries.push(toEntry(header.name, header.size, type === 'directory'));
      }
      stream.on('end', () => next());
      stream.resume();
    });
    extract.on('finish', () => resolve(entries));
    extract.on('error', fail);

    const gunzip = createGunzip();
    gunzip.on('error', fail);
    gunzip.pipe(extract);
    gunzip.end(buffer);
  });
}
