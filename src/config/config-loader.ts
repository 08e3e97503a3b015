import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors';
import { deepMerge } from '../utils/deep-merge';
import { resolveEnvRecursive } from '../utils/env-resolver';
import { expandHome } from '../utils/path-utils';
import { defaults, type ResolvedConfig } from './config-defaults';
import { type Config, validateConfigSafe } from './config-schema';

/**
 * Environment variable naming an alternative config file
 */
export const CONFIG_PATH_ENV = 'TAGESSCHAU_DL_CONFIG';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'tagesschau-dl', 'config.yaml');

/**
 * Merge a validated config over the defaults and make every path absolute
 */
export function resolveConfig(config: Config = {}): ResolvedConfig {
  const merged = deepMerge(defaults, config);
  const dir = resolve(expandHome(merged.cache.dir));

  return {
    ...merged,
    cache: {
      ...merged.cache,
      dir,
      tempDir: merged.cache.tempDir ? resolve(expandHome(merged.cache.tempDir)) : undefined,
    },
  };
}

/**
 * Load and parse configuration from YAML file
 *
 * The default location may be absent, in which case the defaults apply. A path given
 * explicitly (argument or environment) has to exist.
 *
 * @param configPath - Path to config file
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export async function loadConfig(configPath?: string): Promise<ResolvedConfig> {
  const requested = configPath ?? process.env[CONFIG_PATH_ENV];
  const absolutePath = resolve(expandHome(requested ?? DEFAULT_CONFIG_PATH));

  if (!existsSync(absolutePath)) {
    if (requested !== undefined) {
      throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
    }
    return resolveConfig();
  }

  const content = await readFile(absolutePath, 'utf8');

  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(content) ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in "${absolutePath}": ${errorMessage(error)}`);
  }

  let resolvedEnv: unknown;
  try {
    resolvedEnv = resolveEnvRecursive(rawConfig);
  } catch (error) {
    throw new ConfigError(`Failed to resolve "${absolutePath}": ${errorMessage(error)}`);
  }

  const result = validateConfigSafe(resolvedEnv);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${result.error}`);
  }

  return resolveConfig(result.data);
}
