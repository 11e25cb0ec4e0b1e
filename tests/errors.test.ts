import { describe, expect, it } from 'vitest';
import {
  CancellationError,
  CircuitOpenError,
  classifyError,
  errorFromStatus,
  FilterValidationError,
  RateLimitExceededError,
  TransientNetworkError,
  UpstreamClientError,
  UpstreamServerError
} from '../src/errors';

describe('errors', () => {
  it('should mark only network and server failures as retryable', () => {
    expect(new TransientNetworkError('reset').retryable).toBe(true);
    expect(new UpstreamServerError('down', 503).retryable).toBe(true);
    expect(new UpstreamClientError('missing', 404).retryable).toBe(false);
    expect(new RateLimitExceededError(100).retryable).toBe(false);
    expect(new CircuitOpenError().retryable).toBe(false);
    expect(new CancellationError().retryable).toBe(false);
  });

  it('should carry synthetic status codes for gateway-side refusals', () => {
    expect(new TransientNetworkError('reset').statusCode).toBe(0);
    expect(new RateLimitExceededError(100).statusCode).toBe(429);
    expect(new CircuitOpenError().statusCode).toBe(503);
    expect(new CancellationError().statusCode).toBe(499);
  });

  it('should describe the rate limit wait', () => {
    const error = new RateLimitExceededError(1500);

    expect(error.message).toBe('Rate limit exceeded, retry after 1500ms');
    expect(error.retryAfterMs).toBe(1500);
    expect(error.kind).toBe('rate_limited');
  });

  describe('classifyError', () => {
    it('should pass gateway errors through', () => {
      const error = new UpstreamClientError('missing', 404);

      expect(classifyError(error)).toBe(error);
    });

    it('should map abort errors to cancellation', () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';

      const classified = classifyError(abort);
      expect(classified).toBeInstanceOf(CancellationError);
      expect(classified.message).toBe('This operation was aborted');
    });

    it('should treat anything else as a transient network failure', () => {
      expect(classifyError(new Error('ECONNRESET'))).toMatchObject({ kind: 'transient_network', message: 'ECONNRESET' });
      expect(classifyError('boom')).toMatchObject({ kind: 'transient_network', message: 'boom' });
    });
  });

  describe('errorFromStatus', () => {
    it('should split server and client statuses', () => {
      expect(errorFromStatus(502, { error: 'bad gateway' })).toMatchObject({
        kind: 'upstream_server',
        statusCode: 502,
        body: { error: 'bad gateway' },
        message: 'Upstream responded with 502'
      });
      expect(errorFromStatus(404)).toMatchObject({ kind: 'upstream_client', statusCode: 404 });
    });
  });

  it('should join filter issues into one message', () => {
    const error = new FilterValidationError(['page must be a positive integer, got 0', 'pageSize must be an integer between 1 and 100, got 500']);

    expect(error.message).toBe(
      'Invalid product filter: page must be a positive integer, got 0; pageSize must be an integer between 1 and 100, got 500'
    );
    expect(error.issues).toHaveLength(2);
  });
});
