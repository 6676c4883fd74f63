import { isErrorType } from './isErrorType.js';
import { NuclinoError } from './nuclinoError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Raw body mapping attached to API errors for diagnostics. */
export type ResponseData = Readonly<Record<string, unknown>>;

/**
 * Error reported by (or on behalf of) the remote API. Carries the status code,
 * the message and the raw response body.
 */
export class APIError extends NuclinoError {
  /** APIError error-name */
  name = 'APIError';
  /** Status code of the failed response, or a synthesized one */
  #statusCode: number;
  /** Raw response body */
  #responseData: ResponseData;

  /** Creates a new instance of an APIError */
  constructor(statusCode: number, message: string, responseData: ResponseData = {}, opts?: ErrorOptions) {
    super(message, opts);
    this.#statusCode = statusCode;
    this.#responseData = responseData;
  }

  /** Status code of the failed response */
  get statusCode(): number {
    return this.#statusCode;
  }

  /** Raw response body, `{}` when none was available */
  get responseData(): ResponseData {
    return this.#responseData;
  }

  toString(): string {
    return `${this.#statusCode}: ${this.message}`;
  }
}

/**
 * Type guard for {@link APIError}.
 */
export function isApiError(error: unknown): error is APIError {
  return isErrorType(APIError, error);
}

/**
 * Extract an {@link APIError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): APIError | null {
  return unwrapErrorType(APIError, error);
}
