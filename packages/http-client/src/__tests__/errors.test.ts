import { describe, it, expect } from 'vitest';

import {
  HttpClientError,
  HttpStatusError,
  NetworkError,
  NotFoundError,
  ServiceUnavailableError,
  TimeoutError,
  mapHttpStatus,
} from '../errors.js';

describe('HTTP client errors', () => {
  it('should describe transport failures', () => {
    const error = new NetworkError('https://assets.test/a.png', new Error('ECONNREFUSED'));

    expect(error).toBeInstanceOf(HttpClientError);
    expect(error.message).toBe('Request to https://assets.test/a.png failed: ECONNREFUSED');
    expect(error.status).toBeUndefined();
  });

  it('should report timeouts as 408', () => {
    const error = new TimeoutError('https://assets.test/a.png', 250);

    expect(error.message).toBe('Request to https://assets.test/a.png timed out after 250ms');
    expect(error.status).toBe(408);
  });
});

describe('mapHttpStatus', () => {
  it('should map 404 to NotFoundError', () => {
    const error = mapHttpStatus('https://assets.test/a.png', 404);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Request to https://assets.test/a.png returned 404 Not Found');
  });

  it('should map gateway and availability errors to ServiceUnavailableError', () => {
    for (const status of [502, 503, 504]) {
      const error = mapHttpStatus('https://assets.test/a.png', status);
      expect(error).toBeInstanceOf(ServiceUnavailableError);
      expect(error.status).toBe(status);
    }
  });

  it('should keep other statuses as HttpStatusError', () => {
    const error = mapHttpStatus('https://assets.test/a.png', 410, 'Gone');

    expect(error.constructor).toBe(HttpStatusError);
    expect(error.message).toBe('Request to https://assets.test/a.png returned 410 Gone');
  });
});
