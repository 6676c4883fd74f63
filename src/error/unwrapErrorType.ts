/** Constructor of an error class, used to match errors along a `cause` chain. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * With `shallow` set, only the outermost error is inspected.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    if (shallow) {
      return null;
    }

    current = current.cause;
  }

  return null;
}
