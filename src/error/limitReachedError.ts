import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Signal raised by the rate gate when its window is full. The gate handles it
 * internally; callers only see it as the `cause` of a capped retry.
 */
export class LimitReachedError extends NuclinoError {
  /** LimitReachedError error-name */
  name = 'LimitReachedError';
  /** Milliseconds until the oldest admission leaves the window */
  #retryIn: number;

  /** Creates a new LimitReachedError */
  constructor(limit: number, retryIn: number, opts?: ErrorOptions) {
    super(`error rate limit of ${limit} requests reached, window frees up in ${retryIn}ms`, opts);
    this.#retryIn = retryIn;
  }

  /** Milliseconds until the oldest admission leaves the window */
  get retryIn(): number {
    return this.#retryIn;
  }
}

/**
 * Type guard for {@link LimitReachedError}.
 */
export function isLimitReachedError(error: unknown): error is LimitReachedError {
  return isErrorType(LimitReachedError, error);
}
