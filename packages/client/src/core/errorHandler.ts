import axios, { type AxiosResponse } from 'axios';

import { isPlainObject } from '@pressroom/shared';
import type { ErrorPayload } from '@pressroom/shared';

import {
  ApiError,
  AuthenticationError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ValidationError,
} from './errors.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_NETWORK',
]);

/**
 * Error handler for platform responses
 * Maps HTTP status codes to the error taxonomy and wraps transport failures
 */
export class ErrorHandler {
  /**
   * Normalise a response body into an error payload
   * Bodies that are not JSON objects are kept as raw text under `error`
   */
  toPayload(data: unknown): ErrorPayload {
    if (isPlainObject(data)) {
      return data;
    }
    if (typeof data === 'string') {
      return { error: data };
    }
    if (data === undefined || data === null) {
      return { error: '' };
    }
    return { error: JSON.stringify(data) };
  }

  /**
   * Message detail: the payload's `error` field whenever it is present, stringified if it is not text
   */
  private detail(payload: ErrorPayload, status: number): string {
    if (!('error' in payload)) {
      return `HTTP ${status}`;
    }
    const { error } = payload;
    return typeof error === 'string' ? error : String(JSON.stringify(error));
  }

  /**
   * Classify an error response (status >= 400)
   */
  classifyResponse(response: AxiosResponse): ApiError {
    const status = response.status;
    const payload = this.toPayload(response.data);
    const detail = this.detail(payload, status);

    switch (status) {
      case 401:
        return new AuthenticationError(`Unauthorized: ${detail}. Check your API key.`, status, payload);
      case 403:
        return new AuthenticationError(`Forbidden: ${detail}. Check your permissions.`, status, payload);
      case 404:
        return new NotFoundError(`Not found: ${detail}`, status, payload);
      case 400:
      case 422:
        return new ValidationError(`Validation error: ${detail}`, status, payload);
      case 429:
        // retry_after in the body is ignored: the client never retries
        return new RateLimitError('Rate limit exceeded. Please try again later.', status, payload);
      default:
        return new ApiError(`API error: ${detail}`, status, payload);
    }
  }

  /**
   * Wrap a transport-level failure
   * Timeouts and connection failures differ in message only
   */
  wrapTransportError(error: unknown, timeoutMs: number): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));

    if (axios.isAxiosError(error) && error.code) {
      if (TIMEOUT_CODES.has(error.code)) {
        return new NetworkError(`Request timeout after ${timeoutMs / 1000}s`, cause);
      }
      if (CONNECTION_CODES.has(error.code)) {
        return new NetworkError(`Connection failed: ${cause.message}`, cause);
      }
    }

    return new NetworkError(`Request failed: ${cause.message}`, cause);
  }
}
