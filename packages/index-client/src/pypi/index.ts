import {
  AppError,
  DEFAULT_INDEX_URL,
  DEFAULT_USER_AGENT,
  describeError,
  IndexHttpError,
  MalformedResponseError,
  NotFoundError,
  RateLimitError,
  TransientNetworkError,
  type ArtifactEntry,
  type DistributionArtifact,
  type ReleaseInfo,
} from '@typecensus/shared';
import { archiveFormat, listTarGz, listZipBuffer, listZipRemote } from '../archive';
import type { PackageIndex } from '../package-index';
import type { CallOptions } from '../types';
import { PypiProjectSchema, toReleaseInfo } from './schema';

export const DEFAULT_MAX_ARTIFACT_BYTES = 200 * 1024 * 1024;
export const DEFAULT_TAIL_BYTES = 128 * 1024;

export interface PypiJsonIndexOptions {
  /** Root of the JSON API. Default: `https://pypi.org/pypi` */
  baseUrl?: string;
  userAgent?: string;
  /** Sent as a bearer token, for private mirrors */
  token?: string;
  /** Downloads larger than this are refused */
  maxArtifactBytes?: number;
  /** List zip artifacts through range requests when the host allows it */
  remoteListing?: boolean;
  /** Bytes read from the end of a zip on the first range request */
  tailBytes?: number;
}

/**
 * Parses a `Retry-After` header given either in seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

function errorForStatus(response: Response, url: string): AppError {
  const status = response.status;
  const message = `Index returned ${status} for ${url}`;
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 429) {
    return new RateLimitError(message, {
      retryAfter: parseRetryAfter(response.headers.get('retry-after')),
    });
  }
  if (status >= 500) {
    return new TransientNetworkError(message, { status });
  }
  return new IndexHttpError(message, { status });
}

/**
 * Transport failures become `TransientNetworkError`; aborts keep the
 * signal's own error so the retry loop can tell them apart.
 */
function transportError(error: unknown, url: string, signal?: AbortSignal): unknown {
  if (signal?.aborted || error instanceof AppError) {
    return error;
  }
  return new TransientNetworkError(`Request to ${url} failed: ${describeError(error)}`, {
    cause: error,
  });
}

/**
 * A range request answered with the whole artifact. Carries the body so
 * the listing can continue from it.
 */
class RangeIgnoredError extends MalformedResponseError {
  constructor(
    url: string,
    readonly body: Buffer,
  ) {
    super(`Range request to ${url} was answered with the whole artifact`);
  }
}

async function discard(response: Response): Promise<void> {
  if (response.body) {
    await response.body.cancel();
  }
}

/**
 * `PackageIndex` over the PyPI JSON API (`<base>/<project>/json`).
 *
 * Each call is a single attempt; retries, timeouts and logging live in
 * `executeIndexRequest`.
 */
export class PypiJsonIndex implements PackageIndex {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly token?: string;
  private readonly maxArtifactBytes: number;
  private readonly remoteListing: boolean;
  private readonly tailBytes: number;

  constructor(options: PypiJsonIndexOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_INDEX_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.token = options.token;
    this.maxArtifactBytes = options.maxArtifactBytes ?? DEFAULT_MAX_ARTIFACT_BYTES;
    this.remoteListing = options.remoteListing ?? true;
    this.tailBytes = options.tailBytes ?? DEFAULT_TAIL_BYTES;
  }

  id(): string {
    return `pypi-json:${this.baseUrl}`;
  }

  projectUrl(name: string): string {
    return `${this.baseUrl}/${encodeURIComponent(name)}/json`;
  }

  async getProject(name: string, options: CallOptions = {}): Promise<ReleaseInfo | null> {
    const url = this.projectUrl(name);
    const response = await this.send(url, { headers: { Accept: 'application/json' } }, options.signal);
    if (response.status === 404) {
      await discard(response);
      return null;
    }
    if (!response.ok) {
      await discard(response);
      throw errorForStatus(response, url);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new MalformedResponseError(`Invalid JSON from ${url}`, { cause: error });
      }
      throw transportError(error, url, options.signal);
    }

    const parsed = PypiProjectSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new MalformedResponseError(`Unexpected project document for ${name}: ${issues}`, {
        cause: parsed.error,
      });
    }
    return toReleaseInfo(parsed.data);
  }

  async projectExists(name: string, options: CallOptions = {}): Promise<boolean> {
    const url = this.projectUrl(name);
    const response = await this.send(url, { headers: { Accept: 'application/json' } }, options.signal);
    await discard(response);
    if (response.status === 404) {
      return false;
    }
    if (!response.ok) {
      throw errorForStatus(response, url);
    }
    return true;
  }

  async listArtifactFiles(
    artifact: DistributionArtifact,
    options: CallOptions = {},
  ): Promise<ArtifactEntry[]> {
    const format = archiveFormat(artifact.filename);
    const { signal } = options;

    if (format === 'zip' && this.remoteListing) {
      const size = await this.probeRangeSupport(artifact.url, signal);
      if (size !== null) {
        try {
          return await listZipRemote(
            size,
            (start, end) => this.fetchRange(artifact.url, start, end, signal),
            this.tailBytes,
          );
        } catch (error) {
          if (error instanceof RangeIgnoredError) {
            return listZipBuffer(error.body);
          }
          throw error;
        }
      }
    }

    const buffer = await this.download(artifact.url, signal);
    return format === 'zip' ? listZipBuffer(buffer) : listTarGz(buffer);
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...extra };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async send(
    url: string,
    init: { method?: string; headers?: Record<string, string> },
    signal?: AbortSignal,
  ): Promise<Response> {
    try {
      return await fetch(url, {
        method: init.method ?? 'GET',
        headers: this.headers(init.headers),
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw transportError(error, url, signal);
    }
  }

  /**
   * Size of the artifact when the host serves byte ranges, else `null`.
   * Hosts that refuse HEAD, including 501 Not Implemented, get a plain
   * download.
   */
  private async probeRangeSupport(url: string, signal?: AbortSignal): Promise<number | null> {
    const response = await this.send(url, { method: 'HEAD' }, signal);
    await discard(response);
    if (!response.ok) {
      const status = response.status;
      if (status === 404 || status === 429 || (status >= 500 && status !== 501)) {
        throw errorForStatus(response, url);
      }
      return null;
    }
    const acceptRanges = response.headers.get('accept-ranges') ?? '';
    const size = Number(response.headers.get('content-length'));
    if (!acceptRanges.toLowerCase().includes('bytes') || !Number.isInteger(size) || size <= 0) {
      return null;
    }
    return size;
  }

  private async fetchRange(
    url: string,
    start: number,
    end: number,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    const response = await this.send(url, { headers: { Range: `bytes=${start}-${end - 1}` } }, signal);
    if (response.status === 200) {
      const body = await this.readBody(response, url, this.maxArtifactBytes, signal);
      throw new RangeIgnoredError(url, body);
    }
    if (response.status !== 206) {
      await discard(response);
      if (response.ok) {
        throw new MalformedResponseError(`Range request to ${url} was answered with ${response.status}`);
      }
      throw errorForStatus(response, url);
    }
    const chunk = await this.readBody(response, url, this.maxArtifactBytes, signal);
    if (chunk.length !== end - start) {
      throw new MalformedResponseError(
        `Range request to ${url} returned ${chunk.length} bytes, expected ${end - start}`,
      );
    }
    return chunk;
  }

  private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.send(url, {}, signal);
    if (!response.ok) {
      await discard(response);
      throw errorForStatus(response, url);
    }
    const declared = Number(response.headers.get('content-length'));
    if (Number.isFinite(declared) && declared > this.maxArtifactBytes) {
      await discard(response);
      throw this.tooLarge(url);
    }
    return this.readBody(response, url, this.maxArtifactBytes, signal);
  }

  private async readBody(
    response: Response,
    url: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    if (!response.body) {
      return Buffer.alloc(0);
    }
    const reader = response.body.getReader();
    const chunks: Buffer[] = [];
    let total = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        total += value.byteLength;
        if (total > limit) {
          await reader.cancel();
          throw this.tooLarge(url);
        }
        chunks.push(Buffer.from(value));
      }
    } catch (error) {
      throw transportError(error, url, signal);
    }
    return Buffer.concat(chunks);
  }

  private tooLarge(url: string): IndexHttpError {
    return new IndexHttpError(
      `Artifact at ${url} is larger than the ${this.maxArtifactBytes} byte download limit`,
    );
  }
}
