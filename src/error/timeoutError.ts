import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 * Reported with the synthesized status 408.
 */
export class TimeoutError extends HTTPError {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Timeout that was exceeded, in milliseconds */
  #timeout: number;

  /** Creates a new TimeoutError for the given timeout */
  constructor(timeout: number, opts?: ErrorOptions) {
    super(408, `error request timed out after ${timeout}ms`, {}, opts);
    this.#timeout = timeout;
  }

  /** Timeout that was exceeded, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
