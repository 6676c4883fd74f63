/**
 * Error entrypoint: exports the error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted because the client was closed. */
export { AbortError, isAbortError } from './abortError.js';

/** Error reported by or on behalf of the API, carrying status, message and body. */
export { APIError, getApiError, isApiError, type ResponseData } from './apiError.js';

/** Maps a status code onto the HTTP error taxonomy. */
export { classifyStatus } from './classifyStatus.js';

/** Error thrown when client or rate gate options are invalid. */
export { ConfigurationError, isConfigurationError } from './configurationError.js';

/** HTTP error taxonomy. */
export {
  AuthenticationError,
  getHttpError,
  HTTPError,
  isHttpError,
  isNotFoundError,
  isRateLimitError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  ServerError,
  ValidationError,
} from './httpError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** Signal raised by the rate gate when its window is full. */
export { isLimitReachedError, LimitReachedError } from './limitReachedError.js';

/** Error returned by keyed lookups of absent properties. */
export { isMissingPropertyError, MissingPropertyError } from './missingPropertyError.js';

/** Error raised when the transport fails before a status is known. */
export { isNetworkError, NetworkError } from './networkError.js';

/** Root of the library's errors. */
export { isNuclinoError, NuclinoError } from './nuclinoError.js';

/** Error representing a capped retry loop that ran out of attempts. */
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';

/** Error thrown when a payload is rejected by a schema. */
export {
  getSchemaValidationError,
  isSchemaValidationError,
  SchemaValidationError,
} from './schemaValidationError.js';

/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Error raised on an unrecognized `object` tag. */
export { isUnknownObjectError, UnknownObjectError } from './unknownObjectError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
