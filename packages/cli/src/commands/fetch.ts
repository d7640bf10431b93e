/**
 * Fetch command implementation
 */

import * as fs from 'node:fs/promises';

import type { TargetDimensions } from '@tiercache/types';

import type { FetchOptions } from '../config/schema.js';
import { CliError, InputError, OutputError, ResourceNotFoundError, resolveAbsolutePath } from '../errors/index.js';
import { formatFileSize, formatOutcome } from '../progress/formatters.js';

import { type CommandDeps, createCommandContext } from './context.js';

/** Exit code after Ctrl-C */
const INTERRUPTED_EXIT_CODE = 130;

/**
 * Check that the argument is an http(s) URL
 */
export function validateUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InputError(`Invalid URL: ${url}`, 'Pass an absolute URL such as https://example.com/image.png');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InputError(`Unsupported URL scheme: ${parsed.protocol}`, 'Only http and https URLs can be fetched');
  }
  return url;
}

/**
 * Parse repeated "name:value" header arguments
 *
 * Later arguments override earlier ones with the same name.
 */
export function parseHeaderArguments(args: readonly string[] = []): Record<string, string> | undefined {
  if (args.length === 0) return undefined;

  const headers: Record<string, string> = {};
  for (const arg of args) {
    const separator = arg.indexOf(':');
    const name = separator > 0 ? arg.slice(0, separator).trim() : '';
    if (!name) {
      throw new InputError(`Invalid header: ${arg}`, 'Use --header "Name: value"');
    }
    headers[name] = arg.slice(separator + 1).trim();
  }
  return headers;
}

/**
 * Target dimensions from the size options (0 when omitted)
 */
export function targetFromOptions(options: FetchOptions): TargetDimensions {
  return { width: options.width ?? 0, height: options.height ?? 0 };
}

async function writeOutput(bytes: Uint8Array, outputPath: string): Promise<void> {
  try {
    await fs.writeFile(outputPath, bytes);
  } catch (error) {
    throw new OutputError(
      `Failed to write output file: ${resolveAbsolutePath(outputPath)}`,
      error instanceof Error ? error.message : 'unknown error',
    );
  }
}

/**
 * Resolve a resource through the cache
 */
export async function fetchCommand(url: string, options: FetchOptions, deps: CommandDeps = {}): Promise<void> {
  validateUrl(url);
  const headers = parseHeaderArguments(options.header);
  const target = targetFromOptions(options);

  const { cache, reporter } = await createCommandContext(options, deps);
  const { c } = reporter;

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    reporter.start(`Fetching ${url}`);
    const outcome = await cache.load(url, target, {
      strategy: options.strategy ?? 'both',
      headers,
      signal: controller.signal,
    });

    if (outcome.status === 'not-found') {
      reporter.fail(formatOutcome(outcome, c));
      if (outcome.reason === 'cancelled') {
        throw new CliError('Fetch cancelled', undefined, INTERRUPTED_EXIT_CODE);
      }
      throw new ResourceNotFoundError(url, outcome.reason);
    }

    reporter.print(formatOutcome(outcome, c));
    reporter.print(`${c.dim('Key:')} ${outcome.key}`);

    if (options.output) {
      await writeOutput(outcome.object, options.output);
      reporter.print(`${c.dim('Wrote')} ${formatFileSize(outcome.object.byteLength)} to ${options.output}`);
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    cache.dispose();
  }
}
