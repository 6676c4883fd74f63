import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Error raised when a request is aborted because its client was closed.
 */
export class AbortError extends NuclinoError {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
