/**
 * Revalidation Orchestrator
 *
 * Decides, per request, between serving the cached object, a conditional
 * re-fetch and a full fetch, then reconciles the answer into the cache:
 *
 *   CacheCheck → MetadataCheck → ConditionalOrFull → Fresh | NotModified | Failed
 *
 * A validator is sent only when the entry's TTL has expired. No state is
 * kept between requests beyond disk metadata and the network counters, and
 * concurrent requests for the same key are not coalesced.
 */

import type {
  CacheKey,
  CacheMetadata,
  CacheStrategy,
  Fetcher,
  FetchRequest,
  FetchResult,
  HeaderProvider,
  TargetDimensions,
} from '@tiercache/types';

import { generateCacheKey } from '../cache-key.js';
import type { CacheCoordinator } from '../coordinator/cache-coordinator.js';
import { FetchFailedError, toError } from '../errors.js';
import { type CacheLogger, consoleLogger } from '../logger.js';
import { cloneMetadata, createCacheMetadata, markValidated } from '../metadata.js';

import { mergeRequestHeaders } from './headers.js';
import { NetworkStatistics } from './network-stats.js';

/**
 * One load request
 */
export interface LoadRequest {
  address: string;
  target: TargetDimensions;
  /** Tier(s) that receive a fresh download (default: both) */
  strategy?: CacheStrategy;
  /** Per-call headers; override provider and default headers */
  headers?: Record<string, string>;
  /** Aborting before the cache write leaves the cache untouched */
  signal?: AbortSignal;
}

/**
 * Where a resolved object came from
 */
export type LoadSource = 'cache' | 'network' | 'revalidated';

/**
 * Why a request ended without an object
 */
export type NotFoundReason = 'fetch-failed' | 'decode-failed' | 'payload-missing' | 'cancelled';

/**
 * Terminal outcome of a load
 */
export type LoadOutcome<T> =
  | { status: 'resolved'; object: T; source: LoadSource; key: CacheKey }
  | { status: 'not-found'; reason: NotFoundReason; key: CacheKey };

/**
 * Orchestrator dependencies
 */
export interface RevalidationOrchestratorOptions<T> {
  coordinator: CacheCoordinator<T>;
  fetcher: Fetcher;
  headerProvider?: HeaderProvider;
  defaultHeaders?: Record<string, string>;
  statistics?: NetworkStatistics;
  logger?: CacheLogger;
}

export class RevalidationOrchestrator<T> {
  readonly statistics: NetworkStatistics;

  private readonly coordinator: CacheCoordinator<T>;
  private readonly fetcher: Fetcher;
  private readonly headerProvider: HeaderProvider | undefined;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: CacheLogger;

  constructor(options: RevalidationOrchestratorOptions<T>) {
    this.coordinator = options.coordinator;
    this.fetcher = options.fetcher;
    this.headerProvider = options.headerProvider;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.statistics = options.statistics ?? new NetworkStatistics();
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Resolve an object from the cache or the origin
   */
  async load(request: LoadRequest): Promise<LoadOutcome<T>> {
    const key = generateCacheKey(request.address, request.target);
    const notFound = (reason: NotFoundReason): LoadOutcome<T> => ({ status: 'not-found', reason, key });

    if (request.signal?.aborted) {
      return notFound('cancelled');
    }

    // CacheCheck
    const cached = await this.coordinator.getObject(key);
    if (cached !== undefined) {
      return { status: 'resolved', object: cached, source: 'cache', key };
    }

    // MetadataCheck
    const metadata = await this.coordinator.getMetadata(key);
    const expired = await this.coordinator.isExpired(key);
    const validator = expired ? metadata?.validator : undefined;

    // ConditionalOrFull
    const headers = mergeRequestHeaders(this.defaultHeaders, await this.providerHeaders(), request.headers);
    if (validator !== undefined) {
      this.statistics.recordConditionalRequest();
    }
    const result = await this.fetch({
      address: request.address,
      validator,
      headers,
      signal: request.signal,
    });

    if (request.signal?.aborted) {
      return notFound('cancelled');
    }

    switch (result.kind) {
      case 'fresh': {
        this.statistics.recordDownload(result.bytes.byteLength);
        const object = await this.coordinator.decode(result.bytes, request.target, key);
        if (object === undefined) {
          return notFound('decode-failed');
        }
        if (request.signal?.aborted) {
          return notFound('cancelled');
        }
        const fresh = createCacheMetadata({
          resourceAddress: request.address,
          targetDimensions: request.target,
          validator: result.validator,
        });
        await this.coordinator.setObject(key, object, fresh, request.strategy ?? 'both');
        return { status: 'resolved', object, source: 'network', key };
      }

      case 'not-modified':
        return this.handleNotModified(key, metadata, notFound);

      case 'failed': {
        this.statistics.recordFailure();
        const error = new FetchFailedError(request.address, result.error);
        this.logger.warn(error.message, { key, code: error.code });
        return notFound('fetch-failed');
      }
    }
  }

  private async handleNotModified(
    key: CacheKey,
    metadata: CacheMetadata | undefined,
    notFound: (reason: NotFoundReason) => LoadOutcome<T>,
  ): Promise<LoadOutcome<T>> {
    if (metadata) {
      const validated = cloneMetadata(metadata);
      markValidated(validated);
      await this.coordinator.updateMetadata(key, validated);
      this.statistics.recordNotModified(metadata.byteSize);
    } else {
      this.statistics.recordNotModified(0);
    }

    const object = await this.coordinator.getObject(key);
    if (object === undefined) {
      // Not re-fetched here; the dropped entry makes the next load a full fetch.
      this.logger.warn('Payload missing after "not modified" answer', { key });
      return notFound('payload-missing');
    }
    return { status: 'resolved', object, source: 'revalidated', key };
  }

  private async providerHeaders(): Promise<Record<string, string> | undefined> {
    if (!this.headerProvider) return undefined;
    try {
      return await this.headerProvider.headers();
    } catch (err) {
      this.logger.warn('Header provider failed; sending request without its headers', {
        error: toError(err).message,
      });
      return undefined;
    }
  }

  private async fetch(request: FetchRequest): Promise<FetchResult> {
    try {
      return await this.fetcher.fetch(request);
    } catch (err) {
      return { kind: 'failed', error: toError(err) };
    }
  }
}

/**
 * Create an orchestrator over a coordinator and a fetcher
 */
export function createRevalidationOrchestrator<T>(
  options: RevalidationOrchestratorOptions<T>,
): RevalidationOrchestrator<T> {
  return new RevalidationOrchestrator(options);
}
