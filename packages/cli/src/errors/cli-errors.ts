/**
 * Errors raised by commands; each carries an exit code and an optional hint
 */

import * as path from 'node:path';

/**
 * Exit code used when a resource could not be resolved
 */
export const NOT_FOUND_EXIT_CODE = 2;

/**
 * Absolute form of a user-supplied path, for messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Error printed as `Error: ...` followed by an optional suggestion
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Message and suggestion as printed to stderr
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Config file could not be read or parsed
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command-line input
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Fetched bytes could not be written to --output
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * The requested resource could not be resolved from the cache or the origin
 */
export class ResourceNotFoundError extends CliError {
  constructor(
    public readonly url: string,
    public readonly reason: string,
  ) {
    super(`Could not resolve ${url} (${reason})`, undefined, NOT_FOUND_EXIT_CODE);
    this.name = 'ResourceNotFoundError';
  }
}
