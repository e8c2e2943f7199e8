import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import {
  AppError,
  ConfigError,
  IndexHttpError,
  MalformedResponseError,
  normalizePackageName,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  TransientNetworkError,
  type ArtifactEntry,
  type DistributionArtifact,
  type ReleaseInfo,
} from '@typecensus/shared';
import type { PackageIndex } from '../package-index';
import type { CallOptions } from '../types';

const FixtureFileSchema = z.union([
  z.string().min(1),
  z.object({ path: z.string().min(1), size: z.number().int().nonnegative().optional() }),
]);

const FixtureArtifactSchema = z.object({
  filename: z.string().min(1),
  yanked: z.boolean().default(false),
  /** Archive members; a trailing `/` marks a directory */
  files: z.array(FixtureFileSchema).default([]),
});

const FixtureProjectSchema = z.object({
  /** Display name; defaults to the key */
  name: z.string().optional(),
  /** Version reported as latest; defaults to the last listed release */
  version: z.string().optional(),
  releases: z.record(z.array(FixtureArtifactSchema)).default({}),
});

export const FakeOperationSchema = z.enum(['project', 'listing', 'exists']);

const FixtureFailureSchema = z.object({
  operation: FakeOperationSchema,
  /** Project name, or artifact filename for `listing` */
  target: z.string().min(1),
  error: z.enum(['transient', 'ratelimit', 'timeout', 'malformed', 'http']),
  /** How many calls fail before the target recovers; every call when omitted */
  times: z.number().int().positive().optional(),
});

export const FakeIndexFixtureSchema = z.object({
  projects: z.record(FixtureProjectSchema).default({}),
  failures: z.array(FixtureFailureSchema).default([]),
  /** Delay added to every call */
  latencyMs: z.number().int().nonnegative().default(0),
});

export type FakeOperation = z.infer<typeof FakeOperationSchema>;
export type FakeIndexFixture = z.input<typeof FakeIndexFixtureSchema>;
type ParsedFixture = z.infer<typeof FakeIndexFixtureSchema>;
type ParsedFailure = z.infer<typeof FixtureFailureSchema>;
type FixtureFile = z.infer<typeof FixtureFileSchema>;

export interface FakeIndexCall {
  operation: FakeOperation;
  target: string;
}

/**
 * Validates a fixture description (parsed JSON).
 */
export function parseFakeIndexFixture(value: unknown, source = 'fixture'): ParsedFixture {
  const result = FakeIndexFixtureSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid index fixture in ${source}:\n${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function scriptedError(failure: ParsedFailure): AppError {
  const message = `Scripted ${failure.error} failure for ${failure.operation} ${failure.target}`;
  switch (failure.error) {
    case 'transient':
      return new TransientNetworkError(message, { status: 503 });
    case 'ratelimit':
      return new RateLimitError(message, { retryAfter: 0 });
    case 'timeout':
      return new TimeoutError(message);
    case 'malformed':
      return new MalformedResponseError(message);
    case 'http':
      return new IndexHttpError(message, { status: 403 });
  }
}

function kindOf(filename: string): DistributionArtifact['kind'] {
  return filename.toLowerCase().endsWith('.whl') ? 'wheel' : 'sdist';
}

function toEntries(files: FixtureFile[]): ArtifactEntry[] {
  return files.map((file) => {
    const path = typeof file === 'string' ? file : file.path;
    const isDirectory = path.endsWith('/');
    const trimmed = path.replace(/\/+$/, '');
    if (isDirectory) {
      return { path: trimmed, isDirectory };
    }
    return { path: trimmed, size: typeof file === 'string' ? undefined : file.size, isDirectory };
  });
}

/**
 * In-memory `PackageIndex` with scripted failures.
 *
 * Project names are matched after normalization, the way the real index
 * redirects `Requests` to `requests`. Every call is recorded in `calls`.
 */
export class FakePackageIndex implements PackageIndex {
  readonly calls: FakeIndexCall[] = [];

  private readonly fixture: ParsedFixture;
  private readonly projects = new Map<string, ReleaseInfo>();
  private readonly listings = new Map<string, ArtifactEntry[]>();
  private readonly remaining: (number | undefined)[];

  constructor(fixture: FakeIndexFixture = {}) {
    this.fixture = parseFakeIndexFixture(fixture);
    this.remaining = this.fixture.failures.map((failure) => failure.times);

    for (const [key, project] of Object.entries(this.fixture.projects)) {
      const name = project.name ?? key;
      const versions: Record<string, DistributionArtifact[]> = {};
      for (const [version, artifacts] of Object.entries(project.releases)) {
        versions[version] = artifacts.map((artifact) => {
          const url = `fake://${normalizePackageName(name)}/${artifact.filename}`;
          this.listings.set(url, toEntries(artifact.files));
          return {
            filename: artifact.filename,
            url,
            kind: kindOf(artifact.filename),
            yanked: artifact.yanked,
          };
        });
      }
      const version = project.version ?? Object.keys(versions).at(-1) ?? '0';
      this.projects.set(normalizePackageName(key), {
        name,
        version,
        artifacts: versions[version] ?? [],
        versions,
      });
    }
  }

  id(): string {
    return 'fake';
  }

  async getProject(name: string, options: CallOptions = {}): Promise<ReleaseInfo | null> {
    await this.enter('project', name, options);
    return this.projects.get(normalizePackageName(name)) ?? null;
  }

  async listArtifactFiles(
    artifact: DistributionArtifact,
    options: CallOptions = {},
  ): Promise<ArtifactEntry[]> {
    await this.enter('listing', artifact.filename, options);
    const entries = this.listings.get(artifact.url);
    if (!entries) {
      throw new NotFoundError(`No such artifact: ${artifact.url}`);
    }
    return entries.map((entry) => ({ ...entry }));
  }

  async projectExists(name: string, options: CallOptions = {}): Promise<boolean> {
    await this.enter('exists', name, options);
    return this.projects.has(normalizePackageName(name));
  }

  callsFor(operation: FakeOperation, target?: string): FakeIndexCall[] {
    return this.calls.filter(
      (call) => call.operation === operation && (target === undefined || call.target === target),
    );
  }

  private async enter(operation: FakeOperation, target: string, options: CallOptions): Promise<void> {
    this.calls.push({ operation, target });
    options.signal?.throwIfAborted();
    if (this.fixture.latencyMs > 0) {
      await delay(this.fixture.latencyMs, undefined, { signal: options.signal });
    }

    const index = this.fixture.failures.findIndex((failure, i) => {
      if (failure.operation !== operation || failure.target !== target) {
        return false;
      }
      const left = this.remaining[i];
      return left === undefined || left > 0;
    });
    if (index === -1) {
      return;
    }
    const left = this.remaining[index];
    if (left !== undefined) {
      this.remaining[index] = left - 1;
    }
    throw scriptedError(this.fixture.failures[index]);
  }
}
