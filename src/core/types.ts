import type { AnyNuclinoObject } from '../models/types.js';

/** A decoded JSON object, as received from the API. */
export type Payload = { readonly [key: string]: unknown };

/**
 * What a primitive call resolves to once the `data` field has been dispatched:
 * domain objects, untagged mappings passed through as-is, sequences of either,
 * or plain JSON scalars.
 */
export type ParsedResponse = AnyNuclinoObject | Payload | readonly ParsedResponse[] | string | number | boolean | null;

/** Request bodies accepted by `post` and `put`. */
export type RequestBody = Readonly<Record<string, unknown>>;

/**
 * Type guard for decoded JSON objects: plain objects only, so arrays, `null`
 * and domain objects are not payloads.
 */
export function isPayload(value: unknown): value is Payload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
