/**
 * Default configuration values for the CLI
 */

import { createDefaultConfig } from '@tiercache/core';

import type { CliConfig } from './schema.js';

/**
 * Default HTTP timeout: 30 seconds
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Build the default CLI configuration
 */
export function createDefaultCliConfig(): CliConfig {
  return {
    ...createDefaultConfig(),
    timeoutMs: DEFAULT_TIMEOUT_MS,
  };
}
