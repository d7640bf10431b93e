/**
 * Inspect command implementation
 */

import type { FetchOptions } from '../config/schema.js';
import { formatMetadataDisplay } from '../progress/formatters.js';

import { type CommandDeps, createCommandContext } from './context.js';
import { targetFromOptions, validateUrl } from './fetch.js';

/**
 * Print the stored metadata of one entry, without touching the network
 */
export async function inspectCommand(url: string, options: FetchOptions, deps: CommandDeps = {}): Promise<void> {
  validateUrl(url);
  const target = targetFromOptions(options);
  const { cache, config, reporter } = await createCommandContext(options, deps);

  try {
    const metadata = await cache.getMetadata(url, target);
    if (!metadata) {
      reporter.print(reporter.c.dim(`Not cached: ${url} at ${target.width}x${target.height}`));
      return;
    }
    reporter.print(formatMetadataDisplay(cache.keyFor(url, target), metadata, config.ttlMs, Date.now(), reporter.c));
  } finally {
    cache.dispose();
  }
}
