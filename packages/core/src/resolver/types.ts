import type {
  Logger,
  MarkerPolicy,
  PackageRecord,
  ReleasePolicy,
  ResolutionError,
  StubCheck,
} from '@typecensus/shared';
import type { PackageIndex, RetryOptions, Sleep } from '@typecensus/index-client';

/**
 * Result of one package in a batch. Failures never abort the batch.
 */
export type Outcome = { ok: true; record: PackageRecord } | { ok: false; error: ResolutionError };

export interface ResolverOptions {
  index: PackageIndex;
  /** Default: a logger that discards everything */
  logger?: Logger;
  /** Shared by every event of this resolver. Default: a random UUID */
  runId?: string;
  releasePolicy?: ReleasePolicy;
  markerPolicy?: MarkerPolicy;
  stubCheck?: StubCheck;
  /** Default worker count for `resolveMany` */
  concurrency?: number;
  retryOptions?: RetryOptions;
  /** Per-attempt timeout of index requests */
  timeoutMs?: number;
  sleep?: Sleep;
}

export interface ResolveOptions {
  /** Aborts in-flight index requests of this package */
  signal?: AbortSignal;
}

export interface ResolveManyOptions {
  concurrency?: number;
  /** Stops dispatching new packages once aborted */
  signal?: AbortSignal;
  /** Stops dispatching new packages after this many milliseconds */
  deadlineMs?: number;
  /** Called as each slot settles, in completion order */
  onOutcome?: (outcome: Outcome, index: number) => void;
}
