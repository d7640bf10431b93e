/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { createDefaultCliConfig } from './defaults.js';
import type { CliConfig, CliOptions, PartialCliConfig } from './schema.js';
import { ConfigValidationError, validateCliConfig, validatePartialCliConfig } from './validation.js';

type Env = Record<string, string | undefined>;

/**
 * Numeric environment variables and the config field each one sets
 */
const NUMERIC_ENV_VARS = {
  TIERCACHE_DISK_LIMIT: 'diskLimitBytes',
  TIERCACHE_MEMORY_LIMIT: 'memoryLimitBytes',
  TIERCACHE_TTL_MS: 'ttlMs',
  TIERCACHE_TIMEOUT_MS: 'timeoutMs',
} as const;

/**
 * Config file names searched for, in order
 */
export const CONFIG_SEARCH_PLACES = [
  'package.json',
  '.tiercacherc',
  '.tiercacherc.json',
  '.tiercacherc.yaml',
  '.tiercacherc.yml',
  'tiercache.config.js',
  'tiercache.config.cjs',
];

/**
 * Merge a partial configuration over a complete one
 * Defined source values override target values; headers are merged
 */
function mergeConfig(target: CliConfig, source: PartialCliConfig): CliConfig {
  return {
    storage: source.storage ?? target.storage,
    memoryLimitBytes: source.memoryLimitBytes ?? target.memoryLimitBytes,
    diskLimitBytes: source.diskLimitBytes ?? target.diskLimitBytes,
    ttlMs: source.ttlMs ?? target.ttlMs,
    defaultHeaders: { ...target.defaultHeaders, ...source.defaultHeaders },
    timeoutMs: source.timeoutMs ?? target.timeoutMs,
  };
}

/**
 * Parse a numeric environment value; non-numeric text is kept for validation to reject
 */
function parseEnvNumber(value: string): number | string {
  const num = Number(value);
  return value.trim() === '' || isNaN(num) ? value : num;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: Env = process.env): PartialCliConfig {
  const config: Record<string, unknown> = {};

  for (const [envVar, field] of Object.entries(NUMERIC_ENV_VARS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      config[field] = parseEnvNumber(value);
    }
  }

  const cacheDir = env['TIERCACHE_CACHE_DIR'];
  const sharedGroup = env['TIERCACHE_SHARED_GROUP'];
  if (cacheDir) {
    config['storage'] = { kind: 'custom', path: cacheDir };
  } else if (sharedGroup) {
    config['storage'] = { kind: 'shared', identifier: sharedGroup };
  }

  return validatePartialCliConfig(config);
}

/**
 * Load configuration from a config file using cosmiconfig
 *
 * An explicit path that cannot be loaded is an error; a failed search is not.
 */
export async function loadConfigFile(configPath?: string): Promise<PartialCliConfig | null> {
  const explorer = cosmiconfig('tiercache', { searchPlaces: CONFIG_SEARCH_PLACES });

  let loaded: unknown;
  try {
    const result = configPath ? await explorer.load(configPath) : await explorer.search();
    loaded = result?.config;
  } catch (error) {
    if (configPath) {
      throw new ConfigError(
        `Failed to load config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        'Check that the file exists and contains valid JSON, YAML or JavaScript',
      );
    }
    // No readable config file found while searching; fall back to env and defaults
    return null;
  }

  if (loaded === undefined || loaded === null) {
    return null;
  }
  return validatePartialCliConfig(loaded);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialCliConfig {
  const config: PartialCliConfig = {};
  if (options.cacheDir !== undefined) {
    config.storage = { kind: 'custom', path: options.cacheDir };
  }
  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(cliOptions: CliOptions, env: Env = process.env): Promise<CliConfig> {
  // 1. Start with defaults
  let config = createDefaultCliConfig();

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  // 3. Apply environment variables
  config = mergeConfig(config, loadEnvConfig(env));

  // 4. Apply CLI arguments (highest priority)
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  // 5. Validate final config
  return validateCliConfig(config);
}

/**
 * Format configuration as JSON
 */
export function formatConfig(config: CliConfig): string {
  return JSON.stringify(config, null, 2);
}

export { ConfigValidationError };
