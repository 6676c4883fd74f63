import type { z } from 'zod';
import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import { MissingPropertyError } from '../error/missingPropertyError.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { ObjectTag } from './types.js';

/**
 * Read-only snapshot of a tagged API object.
 *
 * Holds a frozen shallow copy of the properties it was built from, plus a
 * non-owning reference to the client that fetched it. The reference is only
 * used for navigation calls; once that client is closed those calls resolve
 * with an `AbortError`.
 *
 * Keys are the API's own camelCase names. Typed accessors on each variant
 * read through {@link NuclinoObject.field}, which checks the value against
 * the variant's schema and yields `undefined` when it does not fit.
 */
export abstract class NuclinoObject<Tag extends ObjectTag = ObjectTag, Shape extends z.ZodRawShape = z.ZodRawShape> {
  /** The variant's `object` tag */
  abstract readonly tag: Tag;
  #props: Payload;
  #shape: Shape;
  #client: NuclinoClient;

  protected constructor(props: Payload, client: NuclinoClient, shape: Shape) {
    this.#props = Object.freeze({ ...props });
    this.#client = client;
    this.#shape = shape;
  }

  /**
   * Keyed lookup, returning the raw value untransformed.
   *
   * @example
   * const [err, title] = item.lookup('title');
   */
  lookup(key: string): SafeWrap<MissingPropertyError, unknown> {
    if (!Object.hasOwn(this.#props, key)) {
      return [new MissingPropertyError(key, this.tag), null];
    }

    return [null, this.#props[key]];
  }

  /** Lookup that yields `fallback` for absent keys. */
  get(key: string, fallback?: unknown): unknown {
    return Object.hasOwn(this.#props, key) ? this.#props[key] : fallback;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.#props, key);
  }

  keys(): string[] {
    return Object.keys(this.#props);
  }

  /** Copy of the underlying properties. */
  toJSON(): Payload {
    return { ...this.#props };
  }

  toString(): string {
    return JSON.stringify(this.#props);
  }

  /**
   * Short label for logs and diagnostics.
   *
   * @example
   * item.describe(); // '<Item "Meeting notes">'
   */
  describe(): string {
    return `<${this.tag.charAt(0).toUpperCase()}${this.tag.slice(1)} "${this.label()}">`;
  }

  /** Human readable part of {@link NuclinoObject.describe} */
  protected abstract label(): string;

  /** Client used for navigation calls */
  protected get client(): NuclinoClient {
    return this.#client;
  }

  /**
   * Typed read of a known property. Returns `undefined` when the key is absent
   * or its value does not match the schema.
   */
  protected field<K extends keyof Shape & string>(key: K): z.output<Shape[K]> | undefined {
    const result = this.#shape[key].safeParse(this.#props[key]);
    return result.success ? result.data : undefined;
  }

  /**
   * Like {@link NuclinoObject.field}, but reports an unusable value as a
   * {@link MissingPropertyError}. Navigation uses it before issuing a call.
   */
  protected require<K extends keyof Shape & string>(key: K): SafeWrap<MissingPropertyError, z.output<Shape[K]>> {
    const value = this.field(key);
    if (value === undefined || value === null) {
      return [new MissingPropertyError(key, this.tag), null];
    }

    return [null, value];
  }

  /**
   * Runs `fetch` for every id in order, stopping at the first failure.
   */
  protected async fetchEach<T>(
    ids: readonly string[],
    fetch: (id: string) => SafeWrapAsync<NuclinoError, T>,
  ): SafeWrapAsync<NuclinoError, T[]> {
    const results: T[] = [];
    for (const id of ids) {
      const [err, value] = await fetch(id);
      if (err) {
        return [err, null];
      }

      results.push(value);
    }

    return [null, results];
  }
}
