import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Error raised when a payload carries an `object` tag this library does not
 * know, which points at an API version mismatch.
 */
export class UnknownObjectError extends NuclinoError {
  /** UnknownObjectError error-name */
  name = 'UnknownObjectError';
  /** The unrecognized tag */
  #tag: string;

  /** Creates a new UnknownObjectError for the given tag */
  constructor(tag: string, opts?: ErrorOptions) {
    super(`error unknown object type "${tag}"`, opts);
    this.#tag = tag;
  }

  /** The unrecognized tag */
  get tag(): string {
    return this.#tag;
  }
}

/**
 * Type guard for {@link UnknownObjectError}.
 */
export function isUnknownObjectError(error: unknown): error is UnknownObjectError {
  return isErrorType(UnknownObjectError, error);
}
