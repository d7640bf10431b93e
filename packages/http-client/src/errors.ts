/**
 * Error classes for HTTP client operations
 */

/**
 * Base error class for HTTP client errors
 */
export class HttpClientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'HttpClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpClientError);
    }
  }
}

/**
 * Error thrown when the request could not reach the origin
 */
export class NetworkError extends HttpClientError {
  constructor(
    public readonly url: string,
    cause?: Error,
  ) {
    super(`Request to ${url} failed${cause ? `: ${cause.message}` : ''}`, undefined, cause);
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a request exceeds its timeout
 */
export class TimeoutError extends HttpClientError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 408);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when the origin answers with a non-success status
 */
export class HttpStatusError extends HttpClientError {
  constructor(
    public readonly url: string,
    status: number,
    public readonly statusText: string = '',
  ) {
    super(`Request to ${url} returned ${status}${statusText ? ` ${statusText}` : ''}`, status);
    this.name = 'HttpStatusError';
  }
}

/**
 * Error thrown when the resource does not exist
 */
export class NotFoundError extends HttpStatusError {
  constructor(url: string) {
    super(url, 404, 'Not Found');
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the origin is temporarily unavailable
 */
export class ServiceUnavailableError extends HttpStatusError {
  constructor(url: string, status: number, statusText?: string) {
    super(url, status, statusText);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Map an HTTP status to the matching error class
 */
export function mapHttpStatus(url: string, status: number, statusText?: string): HttpStatusError {
  switch (status) {
    case 404:
      return new NotFoundError(url);
    case 502:
    case 503:
    case 504:
      return new ServiceUnavailableError(url, status, statusText);
    default:
      return new HttpStatusError(url, status, statusText);
  }
}
