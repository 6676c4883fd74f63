import type { ResponseData } from './apiError.js';
import {
  AuthenticationError,
  HTTPError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  ServerError,
  ValidationError,
} from './httpError.js';

/**
 * Maps a status code onto the error taxonomy. Always yields an error: callers
 * only reach this once a response is known to be unsuccessful or malformed.
 *
 * | status  | error                 |
 * |---------|-----------------------|
 * | 400     | {@link ValidationError}     |
 * | 401     | {@link AuthenticationError} |
 * | 403     | {@link PermissionError}     |
 * | 404     | {@link NotFoundError}       |
 * | 429     | {@link RateLimitError}      |
 * | 500-599 | {@link ServerError}         |
 * | other   | {@link HTTPError}           |
 */
export function classifyStatus(statusCode: number, message: string, responseData: ResponseData = {}): HTTPError {
  switch (statusCode) {
    case 400:
      return new ValidationError(statusCode, message, responseData);
    case 401:
      return new AuthenticationError(statusCode, message, responseData);
    case 403:
      return new PermissionError(statusCode, message, responseData);
    case 404:
      return new NotFoundError(statusCode, message, responseData);
    case 429:
      return new RateLimitError(statusCode, message, responseData);
  }

  if (statusCode >= 500 && statusCode < 600) {
    return new ServerError(statusCode, message, responseData);
  }

  return new HTTPError(statusCode, message, responseData);
}
