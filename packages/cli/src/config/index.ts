/**
 * Configuration module exports
 */

// Schema types
export type { CliConfig, PartialCliConfig, CliOptions, FetchOptions, ClearOptions } from './schema.js';

// Defaults
export { DEFAULT_TIMEOUT_MS, createDefaultCliConfig } from './defaults.js';

// Validation
export {
  cliConfigSchema,
  partialCliConfigSchema,
  ConfigValidationError,
  validateCliConfig,
  validatePartialCliConfig,
} from './validation.js';

// Loader
export { loadConfig, loadConfigFile, loadEnvConfig, formatConfig, CONFIG_SEARCH_PLACES } from './loader.js';
