import { describe, it, expect } from 'vitest';

import {
  CacheErrorCode,
  FetchFailedError,
  PayloadIOError,
  StoragePathUnavailableError,
  TierCacheError,
  toError,
} from '../errors.js';

describe('cache errors', () => {
  it('should carry a code and keep the cause', () => {
    const cause = new Error('EACCES');
    const error = new PayloadIOError('write', '/tmp/x', cause);

    expect(error).toBeInstanceOf(TierCacheError);
    expect(error.code).toBe(CacheErrorCode.PAYLOAD_IO);
    expect(error.message).toBe('Failed to write payload /tmp/x: EACCES');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('PayloadIOError');
  });

  it('should describe unavailable storage', () => {
    const error = new StoragePathUnavailableError('default cache directory');

    expect(error.message).toBe('Cache storage path unavailable: default cache directory');
    expect(error.cause).toBeUndefined();
  });

  it('should name the address of a failed fetch', () => {
    const error = new FetchFailedError('https://assets.test/a.png', new Error('timeout'));

    expect(error.message).toBe('Fetch failed for https://assets.test/a.png: timeout');
    expect(error.code).toBe('FETCH_FAILED');
  });
});

describe('toError', () => {
  it('should wrap non-Error values', () => {
    const original = new Error('boom');

    expect(toError(original)).toBe(original);
    expect(toError('boom').message).toBe('boom');
    expect(toError(42).message).toBe('42');
  });
});
