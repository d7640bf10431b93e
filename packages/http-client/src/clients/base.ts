/**
 * Base HTTP client with timeout and cancellation handling
 */

import { HttpClientError, NetworkError, TimeoutError } from '../errors.js';

/**
 * Configuration for HTTP clients
 */
export interface ClientConfig {
  /** Timeout in milliseconds for each request */
  timeoutMs?: number;
  /** User-Agent header value */
  userAgent?: string;
}

/**
 * Base class for HTTP clients with common functionality
 */
export abstract class BaseHttpClient {
  protected readonly config: Required<ClientConfig>;

  constructor(config: ClientConfig) {
    this.config = {
      timeoutMs: config.timeoutMs ?? 30000,
      userAgent: config.userAgent ?? 'tiercache',
    };
  }

  /**
   * Perform a request with the configured timeout
   *
   * The caller's signal and the timeout both abort the request, including
   * the body read done by `read`. A timeout rejects with TimeoutError; any
   * other transport failure with NetworkError.
   */
  protected async request<T>(
    url: string,
    init: RequestInit,
    signal: AbortSignal | undefined,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const headers = new Headers(init.headers);
    if (!headers.has('user-agent')) {
      headers.set('user-agent', this.config.userAgent);
    }

    try {
      const response = await fetch(url, { ...init, headers, signal: controller.signal });
      return await read(response);
    } catch (err) {
      if (timedOut) {
        throw new TimeoutError(url, this.config.timeoutMs);
      }
      if (err instanceof HttpClientError) {
        throw err;
      }
      throw new NetworkError(url, err instanceof Error ? err : new Error(String(err)));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Request timeout in milliseconds
   */
  public get timeoutMs(): number {
    return this.config.timeoutMs;
  }
}
