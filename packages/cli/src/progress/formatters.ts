/**
 * Output formatting utilities
 */

import { describeLocation, isTtlExpired, resolveBaseDirectory, type LoadOutcome } from '@tiercache/core';
import type { CacheKey, CacheMetadata, CacheStatistics } from '@tiercache/types';

import type { CliConfig } from '../config/schema.js';

import { PLAIN_COLORS } from './colors.js';
import type { ColorFunctions } from './types.js';

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }
  if (ms < 86400000) {
    const hours = Math.floor(ms / 3600000);
    const minutes = Math.round((ms % 3600000) / 60000);
    return `${hours}h ${minutes}m`;
  }
  const days = Math.floor(ms / 86400000);
  const hours = Math.round((ms % 86400000) / 3600000);
  return `${days}d ${hours}h`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Format a 0-1 rate as a percentage
 */
export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Format an epoch-ms timestamp
 */
export function formatTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: CliConfig, c: ColorFunctions = PLAIN_COLORS): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Storage:'));
  lines.push(`  Location: ${describeLocation(config.storage)}`);
  lines.push(`  Directory: ${resolveBaseDirectory(config.storage) ?? c.red('unavailable')}`);
  lines.push('');

  lines.push(c.dim('Budgets:'));
  lines.push(`  Memory: ${formatFileSize(config.memoryLimitBytes)}`);
  lines.push(`  Disk: ${formatFileSize(config.diskLimitBytes)}`);
  lines.push(`  TTL: ${formatDuration(config.ttlMs)}`);
  lines.push('');

  lines.push(c.dim('Network:'));
  lines.push(`  Timeout: ${formatDuration(config.timeoutMs)}`);
  const headerNames = Object.keys(config.defaultHeaders);
  lines.push(`  Default headers: ${headerNames.length > 0 ? headerNames.join(', ') : 'none'}`);

  return lines.join('\n');
}

/**
 * Input for the statistics display
 */
export interface StatsDisplayInput {
  statistics: CacheStatistics;
  diskLimitBytes: number;
  ttlMs: number;
  directory: string;
}

/**
 * Format cache statistics for display
 */
export function formatStatsDisplay(input: StatsDisplayInput, c: ColorFunctions = PLAIN_COLORS): string {
  const { statistics } = input;
  const usage = input.diskLimitBytes > 0 ? statistics.diskSizeBytes / input.diskLimitBytes : 0;
  const usageText = formatPercent(usage);

  return [
    c.bold('Disk cache:'),
    `  Directory: ${input.directory}`,
    `  Entries: ${statistics.diskEntryCount}`,
    `  Size: ${formatFileSize(statistics.diskSizeBytes)} of ${formatFileSize(input.diskLimitBytes)} (${usage > 0.9 ? c.yellow(usageText) : usageText})`,
    `  TTL: ${formatDuration(input.ttlMs)}`,
  ].join('\n');
}

/**
 * Format an entry's metadata for display
 */
export function formatMetadataDisplay(
  key: CacheKey,
  metadata: CacheMetadata,
  ttlMs: number,
  now: number = Date.now(),
  c: ColorFunctions = PLAIN_COLORS,
): string {
  const expired = isTtlExpired(metadata, ttlMs, now);
  return [
    c.bold(`Entry ${key}:`),
    `  Address: ${metadata.resourceAddress}`,
    `  Target: ${metadata.targetDimensions.width}x${metadata.targetDimensions.height}`,
    `  Size: ${formatFileSize(metadata.byteSize)}`,
    `  Validator: ${metadata.validator ?? c.dim('none')}`,
    `  Created: ${formatTimestamp(metadata.createdAt)}`,
    `  Last accessed: ${formatTimestamp(metadata.lastAccessedAt)}`,
    `  Last validated: ${formatTimestamp(metadata.lastValidatedAt)}`,
    `  Accesses: ${metadata.accessCount}`,
    `  Expired: ${expired ? c.yellow('yes') : c.green('no')}`,
  ].join('\n');
}

const SOURCE_LABELS = {
  cache: 'cache',
  network: 'network',
  revalidated: 'cache (revalidated)',
} as const;

/**
 * Format a load outcome in one line
 */
export function formatOutcome(outcome: LoadOutcome<Uint8Array>, c: ColorFunctions = PLAIN_COLORS): string {
  if (outcome.status === 'not-found') {
    return c.red(`Not found (${outcome.reason})`);
  }
  return `${c.green('Resolved')} from ${SOURCE_LABELS[outcome.source]} (${formatFileSize(outcome.object.byteLength)})`;
}
