/**
 * HTTP fetcher
 *
 * Fetcher implementation over the global fetch API. A validator is sent as
 * If-None-Match; 304 maps to "not modified" and the response ETag becomes the
 * new validator.
 */

import type { Fetcher, FetchRequest, FetchResult } from '@tiercache/types';

import { mapHttpStatus } from '../errors.js';

import { BaseHttpClient, type ClientConfig } from './base.js';

/**
 * Default configuration for the HTTP fetcher
 */
export const DEFAULT_HTTP_FETCHER_CONFIG: Required<ClientConfig> = {
  timeoutMs: 30000,
  userAgent: 'tiercache/0.1.0',
};

/**
 * Fetches resources over HTTP(S) with conditional requests
 */
export class HttpFetcher extends BaseHttpClient implements Fetcher {
  constructor(config: Partial<ClientConfig> = {}) {
    super({
      ...DEFAULT_HTTP_FETCHER_CONFIG,
      ...config,
    });
  }

  /**
   * Fetch a resource; never throws
   */
  async fetch(request: FetchRequest): Promise<FetchResult> {
    const headers: Record<string, string> = { ...request.headers };
    if (request.validator !== undefined) {
      headers['If-None-Match'] = request.validator;
    }

    try {
      return await this.request(request.address, { method: 'GET', headers }, request.signal, (response) =>
        this.readResult(request.address, response),
      );
    } catch (err) {
      return { kind: 'failed', error: err instanceof Error ? err : new Error(String(err)) };
    }
  }

  private async readResult(address: string, response: Response): Promise<FetchResult> {
    if (response.status === 304) {
      return { kind: 'not-modified' };
    }

    if (!response.ok) {
      return { kind: 'failed', error: mapHttpStatus(address, response.status, response.statusText) };
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    const etag = response.headers.get('etag');
    return etag !== null ? { kind: 'fresh', bytes, validator: etag } : { kind: 'fresh', bytes };
  }
}
