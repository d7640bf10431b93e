/**
 * Clear command implementation
 */

import type { ClearOptions } from '../config/schema.js';

import { type CommandDeps, createCommandContext } from './context.js';

/**
 * Clear the chosen tiers (both when none is chosen)
 */
export async function clearCommand(options: ClearOptions, deps: CommandDeps = {}): Promise<void> {
  const { cache, reporter } = await createCommandContext(options, deps);
  const both = !options.memory && !options.disk;

  try {
    if (both || options.memory) {
      await cache.clearMemory();
      reporter.print('Cleared memory tier');
    }
    if (both || options.disk) {
      await cache.clearDisk();
      reporter.print(`Cleared disk tier at ${cache.coordinator.disk.paths.baseDirectory}`);
    }
  } finally {
    cache.dispose();
  }
}
