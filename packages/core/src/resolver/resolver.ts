import { randomUUID } from 'crypto';
import {
  CancelledError,
  createEvent,
  describeError,
  normalizePackageName,
  ResolutionError,
  SilentLogger,
  stubPackageName,
  toModuleName,
  UsageError,
  type Config,
  type Logger,
  type MarkerPolicy,
  type PackageRecord,
  type ReleasePolicy,
  type StubCheck,
  type StubPackageQuery,
} from '@typecensus/shared';
import {
  executeIndexRequest,
  type PackageIndex,
  type RequestContext,
  type RetryOptions,
  type Sleep,
} from '@typecensus/index-client';
import { hasPyTypedMarker } from '../markers';
import { selectArtifact, selectRelease } from '../selection';
import type { Outcome, ResolveManyOptions, ResolveOptions, ResolverOptions } from './types';

export const DEFAULT_CONCURRENCY = 10;

/**
 * Determines the typing status of packages on a package index.
 *
 * For each package two independent facts are gathered: whether the
 * inspected artifact ships a `py.typed` marker, and whether a stub-only
 * `types-<name>` project exists. A stub lookup that fails without a
 * definitive answer yields `hasTypesPackage: null`.
 *
 * @example
 * ```typescript
 * const resolver = new PackageTypingResolver({ index: new PypiJsonIndex(), logger });
 * const outcomes = await resolver.resolveMany(['requests', 'attrs'], { concurrency: 4 });
 * ```
 */
export class PackageTypingResolver {
  readonly runId: string;

  private readonly index: PackageIndex;
  private readonly logger: Logger;
  private readonly releasePolicy: ReleasePolicy;
  private readonly markerPolicy: MarkerPolicy;
  private readonly stubCheck: StubCheck;
  private readonly concurrency: number;
  private readonly retryOptions?: RetryOptions;
  private readonly timeoutMs?: number;
  private readonly sleep?: Sleep;

  constructor(options: ResolverOptions) {
    this.index = options.index;
    this.logger = options.logger ?? new SilentLogger();
    this.runId = options.runId ?? randomUUID();
    this.releasePolicy = options.releasePolicy ?? 'index-latest';
    this.markerPolicy = options.markerPolicy ?? 'module-root';
    this.stubCheck = options.stubCheck ?? 'always';
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.retryOptions = options.retryOptions;
    this.timeoutMs = options.timeoutMs;
    this.sleep = options.sleep;
  }

  static fromConfig(
    config: Config,
    index: PackageIndex,
    logger: Logger,
    overrides: Partial<ResolverOptions> = {},
  ): PackageTypingResolver {
    return new PackageTypingResolver({
      index,
      logger,
      releasePolicy: config.resolver.releasePolicy,
      markerPolicy: config.resolver.markerPolicy,
      stubCheck: config.resolver.stubCheck,
      concurrency: config.resolver.concurrency,
      retryOptions: config.retry,
      timeoutMs: config.index.timeoutMs,
      ...overrides,
    });
  }

  /**
   * Resolves one package.
   *
   * @throws ResolutionError when the inline-typing check cannot complete
   */
  async resolve(packageName: string, options: ResolveOptions = {}): Promise<PackageRecord> {
    try {
      return await this.resolveRecord(packageName, options.signal);
    } catch (error) {
      throw error instanceof ResolutionError ? error : new ResolutionError(packageName, error);
    }
  }

  /**
   * Resolves a batch with a bounded worker pool.
   *
   * The result has one slot per input name, in input order. Cancellation
   * stops dispatching; packages never started fail with a `CancelledError`
   * cause while started ones run to completion.
   */
  async resolveMany(names: string[], options: ResolveManyOptions = {}): Promise<Outcome[]> {
    const concurrency = options.concurrency ?? this.concurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new UsageError(`Concurrency must be a positive integer, got ${concurrency}`);
    }

    const total = names.length;
    const startTime = Date.now();
    const slots: (Outcome | undefined)[] = names.map(() => undefined);
    const stop = new AbortController();

    const onAbort = () => stop.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      stop.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }
    const deadline =
      options.deadlineMs !== undefined
        ? setTimeout(
            () => stop.abort(new CancelledError(`Deadline of ${options.deadlineMs}ms reached`)),
            options.deadlineMs,
          )
        : undefined;

    await this.logger.log(
      createEvent(this.runId, {
        type: 'BatchStarted',
        payload: { packageCount: total, concurrency },
      }),
    );

    let next = 0;
    const worker = async () => {
      while (next < total && !stop.signal.aborted) {
        const i = next++;
        const outcome = await this.settle(names[i], i, total);
        slots[i] = outcome;
        options.onOutcome?.(outcome, i);
      }
    };

    try {
      await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));
    } finally {
      if (deadline) clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onAbort);
    }

    let cancelled = 0;
    const outcomes: Outcome[] = [];
    for (let i = 0; i < total; i++) {
      const slot = slots[i];
      if (slot) {
        outcomes.push(slot);
        continue;
      }
      cancelled++;
      const reason: unknown = stop.signal.reason;
      const cause = new CancelledError(
        reason instanceof CancelledError ? reason.message : 'Cancelled before dispatch',
        { cause: reason },
      );
      const outcome: Outcome = { ok: false, error: new ResolutionError(names[i], cause) };
      outcomes.push(outcome);
      await this.logger.log(
        createEvent(this.runId, {
          type: 'PackageFailed',
          payload: {
            index: i + 1,
            total,
            package: names[i],
            error: outcome.error.message,
            cancelled: true,
          },
        }),
      );
      options.onOutcome?.(outcome, i);
    }
    if (cancelled > 0) {
      await this.logger.warn(`Cancelled ${cancelled} of ${total} packages before dispatch`);
    }

    const resolved = outcomes.filter((outcome) => outcome.ok).length;
    await this.logger.log(
      createEvent(this.runId, {
        type: 'BatchFinished',
        payload: {
          resolved,
          failed: total - resolved - cancelled,
          cancelled,
          durationMs: Date.now() - startTime,
        },
      }),
    );
    return outcomes;
  }

  private async settle(name: string, i: number, total: number): Promise<Outcome> {
    const startTime = Date.now();
    try {
      const record = await this.resolve(name);
      await this.logger.info(
        `[${i + 1}/${total}] Result for ${record.package}: hasPyTyped=${record.hasPyTyped} hasTypesPackage=${record.hasTypesPackage}`,
      );
      await this.logger.log(
        createEvent(this.runId, {
          type: 'PackageResolved',
          payload: {
            index: i + 1,
            total,
            package: record.package,
            hasPyTyped: record.hasPyTyped,
            hasTypesPackage: record.hasTypesPackage,
            durationMs: Date.now() - startTime,
          },
        }),
      );
      return { ok: true, record };
    } catch (caught) {
      const error = caught instanceof ResolutionError ? caught : new ResolutionError(name, caught);
      await this.logger.warn(`[${i + 1}/${total}] ${error.message}`);
      await this.logger.log(
        createEvent(this.runId, {
          type: 'PackageFailed',
          payload: { index: i + 1, total, package: name, error: error.message, cancelled: false },
        }),
      );
      return { ok: false, error };
    }
  }

  private async resolveRecord(packageName: string, signal?: AbortSignal): Promise<PackageRecord> {
    const name = normalizePackageName(packageName);
    const ctx = this.requestContext(name, signal);

    if (this.stubCheck === 'when-untyped') {
      const hasPyTyped = await this.checkInlineTyping(name, ctx);
      const hasTypesPackage = hasPyTyped ? null : (await this.lookupStubPackage(name, ctx)).exists;
      return { package: name, hasPyTyped, hasTypesPackage };
    }

    const [inline, stub] = await Promise.allSettled([
      this.checkInlineTyping(name, ctx),
      this.lookupStubPackage(name, ctx),
    ]);
    if (inline.status === 'rejected') {
      throw new ResolutionError(packageName, inline.reason);
    }
    if (stub.status === 'rejected') {
      throw new ResolutionError(packageName, stub.reason);
    }
    return { package: name, hasPyTyped: inline.value, hasTypesPackage: stub.value.exists };
  }

  private requestContext(name: string, signal?: AbortSignal): RequestContext {
    return {
      runId: this.runId,
      logger: this.logger.child({ pkg: name }),
      abortSignal: signal,
      timeoutMs: this.timeoutMs,
      retryOptions: this.retryOptions,
      sleep: this.sleep,
    };
  }

  /**
   * Step A: does the selected artifact of the selected release ship `py.typed`?
   */
  private async checkInlineTyping(name: string, ctx: RequestContext): Promise<boolean> {
    const release = await executeIndexRequest(ctx, 'project', name, (signal) =>
      this.index.getProject(name, { signal }),
    );
    if (!release) {
      await ctx.logger.debug(`${name} is not on the index`);
      return false;
    }

    const selected = selectRelease(release, this.releasePolicy);
    if (!selected) {
      await ctx.logger.debug(`No release of ${name} matches policy ${this.releasePolicy}`);
      return false;
    }
    const artifact = selectArtifact(selected.artifacts);
    if (!artifact) {
      await ctx.logger.debug(`Release ${selected.version} of ${name} has no usable artifact`);
      return false;
    }

    await ctx.logger.log(
      createEvent(this.runId, {
        type: 'ArtifactSelected',
        payload: {
          package: name,
          version: selected.version,
          filename: artifact.filename,
          kind: artifact.kind,
        },
      }),
    );

    const entries = await executeIndexRequest(ctx, 'listing', artifact.filename, (signal) =>
      this.index.listArtifactFiles(artifact, { signal }),
    );
    return hasPyTypedMarker(entries, {
      policy: this.markerPolicy,
      kind: artifact.kind,
      moduleName: toModuleName(name),
    });
  }

  /**
   * Step B: does `types-<name>` exist? Only a definitive answer is a boolean.
   */
  private async lookupStubPackage(name: string, ctx: RequestContext): Promise<StubPackageQuery> {
    const queriedName = stubPackageName(name);
    try {
      const exists = await executeIndexRequest(ctx, 'exists', queriedName, (signal) =>
        this.index.projectExists(queriedName, { signal }),
      );
      return { queriedName, exists };
    } catch (error) {
      if (ctx.abortSignal?.aborted) {
        throw error;
      }
      await ctx.logger.warn(`Stub lookup for ${queriedName} failed: ${describeError(error)}`);
      await ctx.logger.log(
        createEvent(this.runId, {
          type: 'StubLookupUndetermined',
          payload: { package: name, stubPackage: queriedName, error: describeError(error) },
        }),
      );
      return { queriedName, exists: null };
    }
  }
}
