/**
 * Stats command implementation
 */

import type { CliOptions } from '../config/schema.js';
import { formatStatsDisplay } from '../progress/formatters.js';

import { type CommandDeps, createCommandContext } from './context.js';

/**
 * Print disk usage, entry count, budget and TTL
 */
export async function statsCommand(options: CliOptions, deps: CommandDeps = {}): Promise<void> {
  const { cache, config, reporter } = await createCommandContext(options, deps);
  try {
    const statistics = await cache.getStatistics();
    reporter.print(
      formatStatsDisplay(
        {
          statistics,
          diskLimitBytes: cache.getDiskLimit(),
          ttlMs: config.ttlMs,
          directory: cache.coordinator.disk.paths.baseDirectory,
        },
        reporter.c,
      ),
    );
  } finally {
    cache.dispose();
  }
}
