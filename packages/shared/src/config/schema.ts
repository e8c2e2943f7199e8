import { z } from 'zod';

export const DEFAULT_INDEX_URL = 'https://pypi.org/pypi';
export const DEFAULT_USER_AGENT = 'typecensus/0.1 (type-hint status checker)';

export const IndexConfigSchema = z.object({
  /** JSON API root; project metadata lives at `<baseUrl>/<name>/json` */
  baseUrl: z.string().url().default(DEFAULT_INDEX_URL),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  /** Environment variable holding a bearer token for private mirrors */
  tokenEnv: z.string().min(1).optional(),
  /** Per-attempt timeout for index requests */
  timeoutMs: z.number().int().positive().default(30_000),
  /** Artifact downloads larger than this are refused */
  maxArtifactBytes: z
    .number()
    .int()
    .positive()
    .default(200 * 1024 * 1024),
  /** Read zip listings through HTTP range requests when the server allows it */
  remoteListing: z.boolean().default(true),
});
export type IndexConfig = z.infer<typeof IndexConfigSchema>;

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10).default(3),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(10_000),
  backoffFactor: z.number().min(1).default(2),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Which release of a project is inspected for the marker file.
 *
 * - `index-latest`: the version the index reports as latest
 * - `latest-stable`: highest final release with a usable artifact
 * - `latest-any`: highest release including pre-releases
 */
export const ReleasePolicySchema = z.enum(['index-latest', 'latest-stable', 'latest-any']);
export type ReleasePolicy = z.infer<typeof ReleasePolicySchema>;

/**
 * How a file listing is judged.
 *
 * - `module-root`: the importable module directory holds `py.typed`
 * - `strict`: every Python source lies under a directory holding `py.typed`
 */
export const MarkerPolicySchema = z.enum(['module-root', 'strict']);
export type MarkerPolicy = z.infer<typeof MarkerPolicySchema>;

/** `when-untyped` skips the stub lookup for packages that ship the marker. */
export const StubCheckSchema = z.enum(['always', 'when-untyped']);
export type StubCheck = z.infer<typeof StubCheckSchema>;

export const ResolverConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(64).default(10),
  releasePolicy: ReleasePolicySchema.default('index-latest'),
  markerPolicy: MarkerPolicySchema.default('module-root'),
  stubCheck: StubCheckSchema.default('always'),
});
export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

export const LoggingConfigSchema = z.object({
  /** Append structured events to this file */
  jsonlPath: z.string().min(1).optional(),
  verbose: z.boolean().default(false),
});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  index: IndexConfigSchema.default(IndexConfigSchema.parse({})),
  retry: RetryConfigSchema.default(RetryConfigSchema.parse({})),
  resolver: ResolverConfigSchema.default(ResolverConfigSchema.parse({})),
  logging: LoggingConfigSchema.default(LoggingConfigSchema.parse({})),
});
export type Config = z.infer<typeof ConfigSchema>;

/** Like `Partial`, all the way down. Used for layered config sources. */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
