/**
 * Service contracts consumed by the cache
 *
 * The codec and the fetcher are supplied by the embedding application;
 * @tiercache/http-client provides a fetcher and @tiercache/core a
 * passthrough codec for raw bytes.
 */

import type { TargetDimensions } from '../cache/index.js';

/**
 * A value or a promise of it
 */
export type Awaitable<T> = T | Promise<T>;

/**
 * Turns raw bytes into usable objects and back
 *
 * Failure is signalled by returning undefined (throwing is treated the same).
 */
export interface ObjectCodec<T> {
  /** Decode bytes into an object sized for the target */
  decode(bytes: Uint8Array, target: TargetDimensions): Awaitable<T | undefined>;
  /** Preferred encoding for persistence */
  encodePrimary(object: T): Awaitable<Uint8Array | undefined>;
  /** Encoding tried when the primary one fails */
  encodeFallback(object: T): Awaitable<Uint8Array | undefined>;
  /** Estimated in-memory cost in bytes */
  estimatedCost(object: T): number;
}

/**
 * Request passed to a fetcher
 */
export interface FetchRequest {
  /** Resource address */
  address: string;
  /** Validator to send for a conditional fetch */
  validator?: string;
  /** Extra request headers */
  headers?: Record<string, string>;
  /** Cancels the request */
  signal?: AbortSignal;
}

/**
 * Outcome of a fetch
 */
export type FetchResult =
  | { kind: 'fresh'; bytes: Uint8Array; validator?: string }
  | { kind: 'not-modified' }
  | { kind: 'failed'; error: Error };

/**
 * Low-level transport used to reach the origin
 */
export interface Fetcher {
  fetch(request: FetchRequest): Promise<FetchResult>;
}

/**
 * Supplies headers computed at request time (e.g. auth tokens)
 */
export interface HeaderProvider {
  headers(): Awaitable<Record<string, string>>;
}

/**
 * Host signal telling the process to release memory
 */
export interface MemoryPressureSignal {
  /** Register a listener; returns a function that removes it */
  subscribe(listener: () => void): () => void;
}
