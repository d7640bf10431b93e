/**
 * Mock fetcher for testing the revalidation flow
 */

import type { FetchRequest, FetchResult } from '@tiercache/types';
import { vi, type Mock } from 'vitest';

import { bytesOf } from './mock-codec.js';

export interface MockFetcherConfig {
  /** Results returned in order, one per call */
  results?: FetchResult[];
  /** Result once the scripted ones run out */
  fallback?: FetchResult;
}

export interface MockFetcher {
  fetch: Mock<(request: FetchRequest) => Promise<FetchResult>>;
  /** Requests received, in order */
  requests: FetchRequest[];
}

/**
 * A fresh download of some text
 */
export function freshResult(text: string, validator?: string): FetchResult {
  return validator === undefined
    ? { kind: 'fresh', bytes: bytesOf(text) }
    : { kind: 'fresh', bytes: bytesOf(text), validator };
}

export const NOT_MODIFIED: FetchResult = { kind: 'not-modified' };

/**
 * A failed fetch
 */
export function failedResult(message = 'connection refused'): FetchResult {
  return { kind: 'failed', error: new Error(message) };
}

/**
 * Create a fetcher that replays scripted results
 */
export function createMockFetcher(config: MockFetcherConfig = {}): MockFetcher {
  const queue = [...(config.results ?? [])];
  const fallback = config.fallback ?? failedResult('no scripted result');
  const requests: FetchRequest[] = [];

  const fetch = vi.fn(async (request: FetchRequest): Promise<FetchResult> => {
    requests.push(request);
    return queue.shift() ?? fallback;
  });

  return { fetch, requests };
}
