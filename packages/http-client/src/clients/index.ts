/**
 * HTTP client exports
 */

export { BaseHttpClient, type ClientConfig } from './base.js';
export { HttpFetcher, DEFAULT_HTTP_FETCHER_CONFIG } from './http-fetcher.js';
