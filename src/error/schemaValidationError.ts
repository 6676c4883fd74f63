import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a value rejected by a @standard-schema schema.
 */
export class SchemaValidationError extends NuclinoError {
  /** SchemaValidationError error-name */
  name = 'SchemaValidationError';
  /** Schema validation issues */
  issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the SchemaValidationError, with accompanying Issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(`${message}; issues: ${JSON.stringify(issues)}`, opts);

    this.issues = issues;
  }
}

/**
 * Type guard for {@link SchemaValidationError}.
 */
export function isSchemaValidationError(error: unknown): error is SchemaValidationError {
  return isErrorType(SchemaValidationError, error);
}

/**
 * Extract a {@link SchemaValidationError} from an unknown error value, following nested causes.
 */
export function getSchemaValidationError(error: unknown): SchemaValidationError | null {
  return unwrapErrorType(SchemaValidationError, error);
}
