import { isErrorType } from './isErrorType.js';

/**
 * Root of every error this library produces. Anything that is not a
 * `NuclinoError` came from the host environment rather than the client.
 */
export class NuclinoError extends Error {
  /** NuclinoError error-name */
  name = 'NuclinoError';
}

/**
 * Type guard for {@link NuclinoError}, following nested causes.
 */
export function isNuclinoError(error: unknown): error is NuclinoError {
  return isErrorType(NuclinoError, error);
}
