/**
 * @tiercache/types - Shared type definitions for tiercache
 *
 * This package provides a stable import location for types used across
 * multiple packages.
 *
 * Usage:
 *   import type { CacheMetadata, TargetDimensions } from '@tiercache/types';
 *   import type { Fetcher, ObjectCodec } from '@tiercache/types/services';
 */

export * from './cache/index.js';

export type {
  Awaitable,
  ObjectCodec,
  FetchRequest,
  FetchResult,
  Fetcher,
  HeaderProvider,
  MemoryPressureSignal,
} from './services/index.js';
