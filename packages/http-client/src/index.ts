/**
 * @tiercache/http-client - HTTP transport for tiercache
 *
 * This package provides the default Fetcher:
 * - Conditional requests with If-None-Match / 304 handling
 * - Per-request timeouts and caller cancellation
 * - Status code to error mapping
 */

export const VERSION = '0.1.0';

// Re-export clients
export { HttpFetcher, BaseHttpClient, DEFAULT_HTTP_FETCHER_CONFIG, type ClientConfig } from './clients/index.js';

// Re-export errors
export {
  HttpClientError,
  NetworkError,
  TimeoutError,
  HttpStatusError,
  NotFoundError,
  ServiceUnavailableError,
  mapHttpStatus,
} from './errors.js';
