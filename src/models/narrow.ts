import { isPayload, type Payload } from '../core/types.js';
import { ServerError } from '../error/httpError.js';
import type { SafeWrap } from '../utils/wrap.js';
import { NuclinoObject } from './object.js';
import type { ModelOf, ObjectTag } from './types.js';

/** Acknowledgement returned when an item or collection is moved to trash. */
export type DeleteResponse = Payload & { readonly id: string };

/**
 * Type guard for dispatched data carrying one of the given tags.
 *
 * @example
 * if (isModel(data, 'item', 'collection')) {
 *   data.title;
 * }
 */
export function isModel<T extends ObjectTag>(value: unknown, ...tags: T[]): value is ModelOf<T> {
  if (!(value instanceof NuclinoObject)) {
    return false;
  }

  const tag: ObjectTag = value.tag;
  return tags.some((expected) => expected === tag);
}

/** Type guard for the `{ id }` acknowledgement of a delete. */
export function isDeleteResponse(value: unknown): value is DeleteResponse {
  return isPayload(value) && typeof value.id === 'string';
}

function unexpected(expected: string): ServerError {
  return new ServerError(500, `Unexpected response data, expected ${expected}`);
}

/**
 * Narrows dispatched data to a single domain object, or reports the mismatch
 * as a synthesized 500.
 */
export function expectModel<T extends ObjectTag>(data: unknown, ...tags: T[]): SafeWrap<ServerError, ModelOf<T>> {
  if (!isModel(data, ...tags)) {
    return [unexpected(tags.join(' or ')), null];
  }

  return [null, data];
}

/**
 * Narrows dispatched data to a list of domain objects; every element must
 * carry one of the tags.
 */
export function expectModels<T extends ObjectTag>(data: unknown, ...tags: T[]): SafeWrap<ServerError, ModelOf<T>[]> {
  if (!Array.isArray(data)) {
    return [unexpected(`a list of ${tags.join(' or ')}`), null];
  }

  const models: ModelOf<T>[] = [];
  for (const entry of data) {
    if (!isModel(entry, ...tags)) {
      return [unexpected(`a list of ${tags.join(' or ')}`), null];
    }

    models.push(entry);
  }

  return [null, models];
}

/** Narrows dispatched data to a delete acknowledgement. */
export function expectDeleted(data: unknown): SafeWrap<ServerError, DeleteResponse> {
  if (!isDeleteResponse(data)) {
    return [unexpected('a delete acknowledgement'), null];
  }

  return [null, data];
}
