/**
 * Tests for CLI error formatting and exit codes
 */

import { stripVTControlCharacters } from 'node:util';

import { StoragePathUnavailableError } from '@tiercache/core';
import { afterEach, describe, it, expect, vi } from 'vitest';

import { ConfigValidationError } from '../config/validation.js';
import { CliError, InputError, NOT_FOUND_EXIT_CODE, ResourceNotFoundError } from '../errors/cli-errors.js';
import { formatError, handleError } from '../errors/handler.js';

function plain(error: unknown): string {
  return stripVTControlCharacters(formatError(error));
}

describe('CliError', () => {
  it('formats the message with a suggestion', () => {
    const error = new InputError('Invalid header: bad', 'Use --header "Name: value"');

    expect(error.format()).toBe('Error: Invalid header: bad\n\nSuggestion: Use --header "Name: value"');
    expect(error.exitCode).toBe(1);
  });

  it('formats the message alone without a suggestion', () => {
    expect(new CliError('Fetch cancelled', undefined, 130).format()).toBe('Error: Fetch cancelled');
  });

  it('reports unresolved resources with their own exit code', () => {
    const error = new ResourceNotFoundError('https://assets.test/a.png', 'fetch-failed');

    expect(error.message).toBe('Could not resolve https://assets.test/a.png (fetch-failed)');
    expect(error.exitCode).toBe(NOT_FOUND_EXIT_CODE);
  });
});

describe('formatError', () => {
  it('lists validation issues', () => {
    const error = new ConfigValidationError([{ path: 'ttlMs', message: 'Expected number' }]);

    expect(plain(error)).toBe('Configuration validation failed:\n\n  ttlMs: Expected number');
  });

  it('suggests a cache directory when storage is unavailable', () => {
    const error = new StoragePathUnavailableError("shared container 'a/b'");

    expect(plain(error).split('\n')).toEqual([
      "Error: Cache storage path unavailable: shared container 'a/b'",
      '',
      'Suggestion: Pass --cache-dir or set TIERCACHE_CACHE_DIR to a writable directory',
    ]);
  });

  it('formats plain errors and other values', () => {
    expect(plain(new Error('boom'))).toBe('Error: boom');
    expect(plain('boom')).toBe('Error: boom');
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function stubExit(): void {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${String(code)}`);
    });
  }

  it('exits with the CLI error code', () => {
    stubExit();

    expect(() => handleError(new ResourceNotFoundError('https://assets.test/a.png', 'decode-failed'))).toThrow(
      'exit 2',
    );
  });

  it('exits with 1 for other errors', () => {
    stubExit();

    expect(() => handleError(new Error('boom'))).toThrow('exit 1');
  });
});
