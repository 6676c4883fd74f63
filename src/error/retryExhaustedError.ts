import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a capped retry loop that ran out of attempts. The last
 * failure is the `cause`.
 */
export class RetryExhaustedError extends NuclinoError {
  /** RetryExhaustedError error-name */
  name = 'RetryExhaustedError';
  /** Internal attempts tried before retry was exhausted */
  #attempts: number;

  /** Creates a new instance of a RetryExhaustedError with accompanying retries attempted */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts tried before giving up */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Extract an {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): RetryExhaustedError | null {
  return unwrapErrorType(RetryExhaustedError, error);
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}
