import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Error raised when the transport fails before any response status is known
 * (DNS, refused connection, reset socket). The transport error is the `cause`.
 */
export class NetworkError extends NuclinoError {
  /** NetworkError error-name */
  name = 'NetworkError';
}

/**
 * Type guard for {@link NetworkError}.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return isErrorType(NetworkError, error);
}
