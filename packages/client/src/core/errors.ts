import { ERROR_KINDS } from '@pressroom/shared';
import type { ErrorKind, ErrorPayload } from '@pressroom/shared';

/**
 * Base error for all platform API failures
 * Carries the kind tag, the HTTP status (when there was a response)
 * and the payload echoed by the platform
 */
export class ApiError extends Error {
  public readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly response?: ErrorPayload,
    kind: ErrorKind = ERROR_KINDS.API,
  ) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
  }
}

/**
 * Invalid or unauthorised credential (401/403, failed verification probe)
 */
export class AuthenticationError extends ApiError {
  constructor(message: string, statusCode?: number, response?: ErrorPayload) {
    super(message, statusCode, response, ERROR_KINDS.AUTHENTICATION);
    this.name = 'AuthenticationError';
  }
}

/**
 * Malformed caller input, or a 400/422 response
 */
export class ValidationError extends ApiError {
  constructor(message: string, statusCode?: number, response?: ErrorPayload) {
    super(message, statusCode, response, ERROR_KINDS.VALIDATION);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string, statusCode?: number, response?: ErrorPayload) {
    super(message, statusCode, response, ERROR_KINDS.NOT_FOUND);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends ApiError {
  constructor(message: string, statusCode?: number, response?: ErrorPayload) {
    super(message, statusCode, response, ERROR_KINDS.RATE_LIMIT);
    this.name = 'RateLimitError';
  }
}

/**
 * Transport-level failure: timeout, refused connection, DNS, TLS
 * Never has a status code
 */
export class NetworkError extends ApiError {
  constructor(message: string, public readonly originalError?: Error) {
    super(message, undefined, undefined, ERROR_KINDS.NETWORK);
    this.name = 'NetworkError';
  }
}

/**
 * A 2xx response whose body does not match the documented contract
 * Deliberately outside the ApiError hierarchy: the request succeeded
 */
export class ResponseDecodingError extends Error {
  constructor(message: string, public readonly body?: unknown) {
    super(message);
    this.name = 'ResponseDecodingError';
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
