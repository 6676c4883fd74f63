import { APIError, type ResponseData } from './apiError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed HTTP exchange with the API. Used as-is for
 * status codes without a dedicated subclass.
 */
export class HTTPError extends APIError {
  /** HTTPError error-name */
  name = 'HTTPError';
}

/** The request was rejected as invalid (400). */
export class ValidationError extends HTTPError {
  name = 'ValidationError';
}

/** The API key is missing, invalid or revoked (401). */
export class AuthenticationError extends HTTPError {
  name = 'AuthenticationError';
}

/** The key is valid but not allowed to touch the resource (403). */
export class PermissionError extends HTTPError {
  name = 'PermissionError';
}

/** The resource does not exist or is not visible to the key (404). */
export class NotFoundError extends HTTPError {
  name = 'NotFoundError';
}

/** Remote side failed (5xx). */
export class ServerError extends HTTPError {
  name = 'ServerError';
}

/**
 * The API refused the request because of its own rate limit (429).
 */
export class RateLimitError extends HTTPError {
  name = 'RateLimitError';
  /** Seconds the API asked us to wait, when the body says so */
  #retryAfter: number | undefined;

  /** Creates a new RateLimitError, reading `retry_after`/`retryAfter` from the body */
  constructor(statusCode: number, message: string, responseData: ResponseData = {}, opts?: ErrorOptions) {
    super(statusCode, message, responseData, opts);
    this.#retryAfter = readRetryAfter(responseData);
  }

  /** Seconds to wait before retrying, if the API provided a hint */
  get retryAfter(): number | undefined {
    return this.#retryAfter;
  }
}

function readRetryAfter(responseData: ResponseData): number | undefined {
  const hint = responseData.retry_after ?? responseData.retryAfter;
  if (typeof hint === 'number' && Number.isFinite(hint)) {
    return hint;
  }

  if (typeof hint === 'string' && hint.trim() !== '') {
    const parsed = Number(hint);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  return undefined;
}

/**
 * Type guard for {@link HTTPError} and every subclass of it.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}
