/**
 * Core entrypoint: the client core, the full API client and the response dispatcher.
 * Import from here if you only need the clients without error helpers.
 * @module
 */

/** Client core with the get/post/put/delete primitives. */
export { BASE_URL, NuclinoClient, type NuclinoClientProps, type RateLimitOptions } from './client.js';

/** Dispatcher turning response data into domain objects. */
export { type DispatchTag, type Loader, type ParseOptions, parse, resolveLoader } from './dispatch.js';

/** Full API client and scoped usage helper. */
export { Nuclino, withNuclino } from './nuclino.js';

/** Response and request data shapes. */
export { isPayload, type ParsedResponse, type Payload, type RequestBody } from './types.js';
