/**
 * Shared setup for commands that open the cache
 */

import { binaryCodec, type CacheLogger, consoleLogger, createVerboseLogger, TierCache } from '@tiercache/core';
import { HttpFetcher } from '@tiercache/http-client';
import type { Fetcher } from '@tiercache/types';

import { loadConfig } from '../config/loader.js';
import type { CliConfig, CliOptions } from '../config/schema.js';
import { ProgressReporter } from '../progress/reporter.js';

/**
 * What a command works with
 */
export interface CommandContext {
  config: CliConfig;
  reporter: ProgressReporter;
  cache: TierCache<Uint8Array>;
}

/**
 * Dependencies that tests replace
 */
export interface CommandDeps {
  fetcher?: Fetcher;
  logger?: CacheLogger;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration and open the cache as raw bytes
 */
export async function createCommandContext(options: CliOptions, deps: CommandDeps = {}): Promise<CommandContext> {
  const config = await loadConfig(options, deps.env);
  const reporter = new ProgressReporter({ color: !options.noColor });
  const logger = deps.logger ?? (options.verbose ? createVerboseLogger() : consoleLogger);

  const cache = new TierCache<Uint8Array>({
    config,
    codec: binaryCodec,
    fetcher: deps.fetcher ?? new HttpFetcher({ timeoutMs: config.timeoutMs }),
    logger,
  });

  return { config, reporter, cache };
}
