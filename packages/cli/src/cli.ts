/**
 * CLI definition using Commander.js
 */

import { CACHE_STRATEGIES, type CacheStrategy } from '@tiercache/types';
import { Command, InvalidArgumentError, Option } from 'commander';

import type { ClearOptions, CliOptions, FetchOptions } from './config/schema.js';

export const VERSION = '0.1.0';

/**
 * Strategy descriptions for help text
 */
const STRATEGY_HELP = `Tier(s) that store a fresh download:
    memoryOnly - Keep the object in memory only
    diskOnly   - Persist the payload only
    both       - Memory and disk [default]`;

/**
 * Parse a non-negative pixel dimension
 */
export function parseDimension(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

/**
 * Collect a repeatable option into an array
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function isCacheStrategy(value: unknown): value is CacheStrategy {
  return CACHE_STRATEGIES.some((strategy) => strategy === value);
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Add the options every command accepts
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--cache-dir <dir>', 'Cache directory (overrides config and TIERCACHE_CACHE_DIR)')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Print cache diagnostics to stderr');
}

/**
 * Add the resource size options
 */
function withSizeOptions(command: Command): Command {
  return command
    .option('-w, --width <px>', 'Target width in pixels', parseDimension, 0)
    .option('-H, --height <px>', 'Target height in pixels', parseDimension, 0);
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tiercache')
    .description('Two-tier object cache - fetch resources through a memory and disk cache with ETag revalidation')
    .version(VERSION);

  // Fetch command
  const fetch = program
    .command('fetch')
    .description('Resolve a resource through the cache, downloading or revalidating as needed')
    .argument('<url>', 'Resource URL');
  withSizeOptions(fetch)
    .addOption(new Option('-s, --strategy <strategy>', STRATEGY_HELP).choices(CACHE_STRATEGIES).default('both'))
    .option('--header <name:value>', 'Request header (repeatable)', collect, [])
    .option('-o, --output <file>', 'Write the resolved bytes to a file');
  withCommonOptions(fetch).action(async (url: string, options: Record<string, unknown>) => {
    // Import dynamically to keep startup light
    const { fetchCommand } = await import('./commands/fetch.js');
    await fetchCommand(url, parseFetchOptions(options));
  });

  // Stats command
  const stats = program.command('stats').description('Show disk cache size, entry count, budget and TTL');
  withCommonOptions(stats).action(async (options: Record<string, unknown>) => {
    const { statsCommand } = await import('./commands/stats.js');
    await statsCommand(parseCliOptions(options));
  });

  // Inspect command
  const inspect = program
    .command('inspect')
    .description('Show the cached metadata for a resource')
    .argument('<url>', 'Resource URL');
  withCommonOptions(withSizeOptions(inspect)).action(async (url: string, options: Record<string, unknown>) => {
    const { inspectCommand } = await import('./commands/inspect.js');
    await inspectCommand(url, parseFetchOptions(options));
  });

  // Clear command
  const clear = program
    .command('clear')
    .description('Clear cached entries (both tiers unless a tier is chosen)')
    .option('--memory', 'Clear the memory tier')
    .option('--disk', 'Clear the disk tier');
  withCommonOptions(clear).action(async (options: Record<string, unknown>) => {
    const { clearCommand } = await import('./commands/clear.js');
    await clearCommand(parseClearOptions(options));
  });

  // Config command
  const config = program
    .command('config')
    .description('Print the resolved configuration')
    .option('--json', 'Print as JSON');
  withCommonOptions(config).action(async (options: Record<string, unknown>) => {
    const { configCommand } = await import('./commands/config.js');
    await configCommand(parseCliOptions(options), booleanOption(options['json']) ?? false);
  });

  return program;
}

/**
 * Parse the options shared by every command
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = stringOption(options['config']);
  if (config !== undefined) result.config = config;
  const cacheDir = stringOption(options['cacheDir']);
  if (cacheDir !== undefined) result.cacheDir = cacheDir;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;
  const verbose = booleanOption(options['verbose']);
  if (verbose !== undefined) result.verbose = verbose;

  return result;
}

/**
 * Parse fetch/inspect command options
 */
export function parseFetchOptions(options: Record<string, unknown>): FetchOptions {
  const result: FetchOptions = parseCliOptions(options);

  const width = numberOption(options['width']);
  if (width !== undefined) result.width = width;
  const height = numberOption(options['height']);
  if (height !== undefined) result.height = height;
  if (isCacheStrategy(options['strategy'])) result.strategy = options['strategy'];
  const header = options['header'];
  if (Array.isArray(header)) result.header = header.filter((h): h is string => typeof h === 'string');
  const output = stringOption(options['output']);
  if (output !== undefined) result.output = output;

  return result;
}

/**
 * Parse clear command options
 */
export function parseClearOptions(options: Record<string, unknown>): ClearOptions {
  const result: ClearOptions = parseCliOptions(options);

  const memory = booleanOption(options['memory']);
  if (memory !== undefined) result.memory = memory;
  const disk = booleanOption(options['disk']);
  if (disk !== undefined) result.disk = disk;

  return result;
}
