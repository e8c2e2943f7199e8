import { PassThrough, type Readable } from 'stream';
import * as yauzl from 'yauzl';
import { toError } from '@typecensus/shared';

/** Fetches bytes `[start, end)` of a remote file. */
export type RangeFetcher = (start: number, end: number) => Promise<Buffer>;

/**
 * Random access over a remote file for yauzl.
 *
 * The first read fetches the last `tailBytes` of the file, which normally
 * covers the end-of-central-directory record and the whole central
 * directory. A read below the cached window extends it down to the read
 * offset in one request, so walking the central directory costs at most
 * one more round trip.
 */
export class HttpRangeReader extends yauzl.RandomAccessReader {
  private window: { start: number; data: Buffer } | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly size: number,
    private readonly fetchRange: RangeFetcher,
    private readonly tailBytes: number,
  ) {
    super();
  }

  _readStreamForRange(start: number, end: number): Readable {
    const stream = new PassThrough();
    this.fetchSerialized(start, end).then(
      (chunk) => {
        stream.end(chunk);
      },
      (error: unknown) => {
        stream.destroy(toError(error));
      },
    );
    return stream;
  }

  /** Serialized so concurrent reads never fetch the same bytes twice. */
  private fetchSerialized(start: number, end: number): Promise<Buffer> {
    const next = this.queue.then(() => this.readCached(start, end));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async readCached(start: number, end: number): Promise<Buffer> {
    if (!this.window) {
      const windowStart = Math.min(start, Math.max(0, this.size - this.tailBytes));
      this.window = { start: windowStart, data: await this.fetchRange(windowStart, this.size) };
    } else if (start < this.window.start) {
      const below = await this.fetchRange(start, this.window.start);
      this.window = { start, data: Buffer.concat([below, this.window.data]) };
    }
    return this.window.data.subarray(start - this.window.start, end - this.window.start);
  }
}
