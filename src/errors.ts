/**
 * Failure taxonomy for upstream catalog calls.
 *
 * Every failure that reaches the Gateway is turned into one of these classes by
 * {@link classifyError}, and from there into the `errorKind` of an UpstreamResponse.
 */
export type ErrorKind =
  | 'transient_network'
  | 'upstream_server'
  | 'upstream_client'
  | 'rate_limited'
  | 'circuit_open'
  | 'cancelled';

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;
  readonly statusCode: number;

  protected constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

/** Timeout, connection reset, DNS failure. Retried. */
export class TransientNetworkError extends GatewayError {
  readonly kind = 'transient_network' as const;
  readonly retryable = true;

  constructor(message: string, statusCode: number = 0) {
    super(message, statusCode);
    this.name = 'TransientNetworkError';
  }
}

/** 5xx from upstream. Retried. */
export class UpstreamServerError extends GatewayError {
  readonly kind = 'upstream_server' as const;
  readonly retryable = true;
  readonly body: unknown;

  constructor(message: string, statusCode: number, body?: unknown) {
    super(message, statusCode);
    this.name = 'UpstreamServerError';
    this.body = body;
  }
}

/** 4xx from upstream. Never retried. */
export class UpstreamClientError extends GatewayError {
  readonly kind = 'upstream_client' as const;
  readonly retryable = false;
  readonly body: unknown;

  constructor(message: string, statusCode: number, body?: unknown) {
    super(message, statusCode);
    this.name = 'UpstreamClientError';
    this.body = body;
  }
}

export class RateLimitExceededError extends GatewayError {
  readonly kind = 'rate_limited' as const;
  readonly retryable = false;
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(`Rate limit exceeded, retry after ${retryAfterMs}ms`, 429);
    this.name = 'RateLimitExceededError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class CircuitOpenError extends GatewayError {
  readonly kind = 'circuit_open' as const;
  readonly retryable = false;

  constructor(message: string = 'Circuit breaker is open') {
    super(message, 503);
    this.name = 'CircuitOpenError';
  }
}

/** Caller-initiated abort. Reported with the non-standard 499 "client closed request" status. */
export class CancellationError extends GatewayError {
  readonly kind = 'cancelled' as const;
  readonly retryable = false;

  constructor(message: string = 'Request cancelled') {
    super(message, 499);
    this.name = 'CancellationError';
  }
}

/** Thrown when a ProductFilter does not pass validation. */
export class FilterValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid product filter: ${issues.join('; ')}`);
    this.name = 'FilterValidationError';
    this.issues = issues;
  }
}

/** Thrown by createOptions/validateOptions on unknown keys or invalid values. */
export class OptionsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionsValidationError';
  }
}

/** Thrown by createLexicon when the tables are malformed or contradict each other. */
export class LexiconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LexiconError';
  }
}

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');

/**
 * Map anything thrown by a transport into the taxonomy.
 * Unknown errors are treated as transient network failures.
 */
export const classifyError = (error: unknown): GatewayError => {
  if (error instanceof GatewayError) {
    return error;
  }
  if (isAbortError(error)) {
    return new CancellationError(error instanceof Error ? error.message : undefined);
  }
  if (error instanceof Error) {
    return new TransientNetworkError(error.message);
  }
  return new TransientNetworkError(String(error));
};

export const errorFromStatus = (status: number, body?: unknown): GatewayError => {
  if (status >= 500) {
    return new UpstreamServerError(`Upstream responded with ${status}`, status, body);
  }
  return new UpstreamClientError(`Upstream responded with ${status}`, status, body);
};
