import { Command } from 'commander';
import fs from 'fs';
import { z } from 'zod';
import { ConfigLoader, PackageTypingResolver, resolveIndexToken } from '@typecensus/core';
import {
  FakePackageIndex,
  PypiJsonIndex,
  parseFakeIndexFixture,
  type PackageIndex,
} from '@typecensus/index-client';
import {
  ConsoleLogger,
  JsonlLogger,
  MarkerPolicySchema,
  ReleasePolicySchema,
  StubCheckSchema,
  UsageError,
  describeError,
  type Config,
  type DeepPartial,
  type Logger,
} from '@typecensus/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../types';

const integerFlag = (flag: string) =>
  z
    .string()
    .regex(/^\d+$/, `${flag} must be a non-negative integer`)
    .transform((value) => Number(value))
    .optional();

export const CheckOptionsSchema = z.object({
  concurrency: integerFlag('--concurrency'),
  releasePolicy: ReleasePolicySchema.optional(),
  markerPolicy: MarkerPolicySchema.optional(),
  stubCheck: StubCheckSchema.optional(),
  deadline: integerFlag('--deadline'),
  fixture: z.string().min(1).optional(),
});
export type CheckOptions = z.infer<typeof CheckOptionsSchema>;

export function parseCheckOptions(raw: unknown): CheckOptions {
  const result = CheckOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new UsageError(`Invalid options: ${issues.join('; ')}`);
  }
  return result.data;
}

function toConfigFlags(options: CheckOptions, globalOpts: GlobalOptions): DeepPartial<Config> {
  const flags: DeepPartial<Config> = {
    resolver: {
      concurrency: options.concurrency,
      releasePolicy: options.releasePolicy,
      markerPolicy: options.markerPolicy,
      stubCheck: options.stubCheck,
    },
  };
  if (globalOpts.verbose) {
    flags.logging = { verbose: true };
  }
  return flags;
}

export function loadFixtureIndex(fixturePath: string): FakePackageIndex {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(fixturePath, 'utf8'));
  } catch (error: unknown) {
    throw new UsageError(`Cannot read index fixture ${fixturePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return new FakePackageIndex(parseFakeIndexFixture(raw, fixturePath));
}

function createIndex(config: Config, options: CheckOptions): PackageIndex {
  if (options.fixture) {
    return loadFixtureIndex(options.fixture);
  }
  return new PypiJsonIndex({
    baseUrl: config.index.baseUrl,
    userAgent: config.index.userAgent,
    token: resolveIndexToken(config),
    maxArtifactBytes: config.index.maxArtifactBytes,
    remoteListing: config.index.remoteListing,
  });
}

function createLogger(config: Config): Logger {
  const consoleLogger = new ConsoleLogger({ verbose: config.logging.verbose });
  return config.logging.jsonlPath
    ? new JsonlLogger(config.logging.jsonlPath, consoleLogger)
    : consoleLogger;
}

/**
 * Resolves the typing status of `packages` and prints one row per package.
 *
 * @returns 0 when every package resolved, 1 otherwise
 */
export async function runCheck(
  packages: string[],
  rawOptions: unknown,
  globalOpts: GlobalOptions,
  cwd: string = process.cwd(),
): Promise<number> {
  const options = parseCheckOptions(rawOptions);
  const config = ConfigLoader.load({
    configPath: globalOpts.config,
    flags: toConfigFlags(options, globalOpts),
    cwd,
  });

  const logger = createLogger(config);
  const resolver = PackageTypingResolver.fromConfig(config, createIndex(config, options), logger);
  const renderer = new OutputRenderer(!!globalOpts.json);

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    const outcomes = await resolver.resolveMany(packages, {
      signal: controller.signal,
      deadlineMs: options.deadline,
    });
    const report = renderer.renderOutcomes(outcomes);
    return report.summary.resolved === report.summary.total ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function registerCheckCommand(program: Command) {
  program
    .command('check')
    .argument('<packages...>', 'Package names to check')
    .description('Report whether packages ship inline types or have a types- stub package')
    .option('--concurrency <n>', 'Number of packages resolved at once')
    .option('--release-policy <policy>', 'index-latest, latest-stable or latest-any')
    .option('--marker-policy <policy>', 'module-root or strict')
    .option('--stub-check <mode>', 'always or when-untyped')
    .option('--deadline <ms>', 'Stop dispatching packages after this many milliseconds')
    .option('--fixture <path>', 'Answer from a JSON index fixture instead of the network')
    .action(async (packages: string[], options: unknown) => {
      const globalOpts: GlobalOptions = program.opts();
      process.exitCode = await runCheck(packages, options, globalOpts);
    });
}
