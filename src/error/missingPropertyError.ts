import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';

/**
 * Error returned by keyed lookups on a domain object when the key is absent.
 */
export class MissingPropertyError extends NuclinoError {
  /** MissingPropertyError error-name */
  name = 'MissingPropertyError';
  /** Key that was looked up */
  #key: string;

  /** Creates a new MissingPropertyError; `owner` names the kind of object, e.g. its `object` tag */
  constructor(key: string, owner: string, opts?: ErrorOptions) {
    super(`error ${owner} has no property "${key}"`, opts);
    this.#key = key;
  }

  /** Key that was looked up */
  get key(): string {
    return this.#key;
  }
}

/**
 * Type guard for {@link MissingPropertyError}.
 */
export function isMissingPropertyError(error: unknown): error is MissingPropertyError {
  return isErrorType(MissingPropertyError, error);
}
