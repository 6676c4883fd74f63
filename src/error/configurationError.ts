import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Error thrown at construction time when client or rate gate options are
 * invalid. The rejected schema issues are available through `cause`.
 */
export class ConfigurationError extends NuclinoError {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}
