import fs from 'fs';
import path from 'path';
import os from 'os';
import * as yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type DeepPartial } from '@typecensus/shared';

export const USER_CONFIG_PATH = path.join('.typecensus', 'config.yaml');
export const PROJECT_CONFIG_FILE = '.typecensus.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: DeepPartial<Config>; // CLI flags
  cwd?: string; // Directory holding the project config
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isRecord(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * Deep-merges `source` over `target`. Nested mappings merge; arrays and
   * primitives replace; `undefined` leaves the target value.
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output: Record<string, unknown> = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.typecensus/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_PATH));

    // 2. Project config: <cwd>/.typecensus.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: Record<string, unknown> = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags
    const flagConfig: Record<string, unknown> = { ...options.flags };

    // Precedence: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

/**
 * Bearer token for the index, read from the variable named by
 * `index.tokenEnv`.
 */
export function resolveIndexToken(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const name = config.index.tokenEnv;
  if (!name) {
    return undefined;
  }
  const value = env[name];
  return value ? value : undefined;
}
