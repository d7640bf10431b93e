/**
 * Error handling utilities
 */

import { StoragePathUnavailableError } from '@tiercache/core';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof StoragePathUnavailableError) {
    return chalk.red(
      [`Error: ${error.message}`, '', 'Suggestion: Pass --cache-dir or set TIERCACHE_CACHE_DIR to a writable directory'].join(
        '\n',
      ),
    );
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}
