import type { z } from 'zod';
import type { NuclinoError } from '../error/nuclinoError.js';
import { ServerError } from '../error/httpError.js';
import { UnknownObjectError } from '../error/unknownObjectError.js';
import { File } from '../models/file.js';
import { Collection, Item } from '../models/item.js';
import { NuclinoObject } from '../models/object.js';
import { objectSchemas } from '../models/schemas.js';
import { Team } from '../models/team.js';
import type { AnyNuclinoObject, ObjectTag } from '../models/types.js';
import { User } from '../models/user.js';
import { Workspace } from '../models/workspace.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { NuclinoClient } from './client.js';
import { isPayload, type ParsedResponse, type Payload } from './types.js';

/** Tags the dispatcher recognizes: the object tags plus `list`. */
export type DispatchTag = ObjectTag | 'list';

/** How one tag turns into a value. */
export interface Loader {
  tag: DispatchTag;
  /** Payload schema checked when validation is on */
  schema: z.ZodTypeAny;
  /** Builds a domain object, or for `list` extracts the raw results */
  load: (props: Payload, client: NuclinoClient) => AnyNuclinoObject | readonly unknown[];
}

/** Options for {@link parse} */
export interface ParseOptions {
  /**
   * Validate tagged payloads against their schema before loading.
   * @default false
   */
  validation?: boolean;
}

/**
 * Resolves the loader for an `object` tag. Unknown tags point at an API
 * version mismatch and fail with {@link UnknownObjectError}.
 */
export function resolveLoader(tag: string): SafeWrap<UnknownObjectError, Loader> {
  switch (tag) {
    case 'list':
      return [
        null,
        {
          tag,
          schema: objectSchemas.list,
          load: (props) => {
            const results = props.results;
            return Array.isArray(results) ? results : [];
          },
        },
      ];
    case 'user':
      return [null, { tag, schema: objectSchemas.user, load: (props, client) => new User(props, client) }];
    case 'team':
      return [null, { tag, schema: objectSchemas.team, load: (props, client) => new Team(props, client) }];
    case 'workspace':
      return [null, { tag, schema: objectSchemas.workspace, load: (props, client) => new Workspace(props, client) }];
    case 'item':
      return [null, { tag, schema: objectSchemas.item, load: (props, client) => new Item(props, client) }];
    case 'collection':
      return [null, { tag, schema: objectSchemas.collection, load: (props, client) => new Collection(props, client) }];
    case 'file':
      return [null, { tag, schema: objectSchemas.file, load: (props, client) => new File(props, client) }];
    default:
      return [new UnknownObjectError(tag), null];
  }
}

/**
 * Turns decoded response data into domain objects.
 *
 * - Scalars, and mappings without an `object` key, come back unchanged (same reference).
 * - Arrays are parsed element by element.
 * - Tagged mappings go through their loader; `list` results are parsed
 *   recursively, each element on its own, so mixed lists work.
 *
 * The first element that fails fails the whole parse.
 */
export function parse(
  payload: unknown,
  client: NuclinoClient,
  opts: ParseOptions = {},
): SafeWrap<NuclinoError, ParsedResponse> {
  if (Array.isArray(payload)) {
    return parseEach(payload, client, opts);
  }

  if (payload === null || typeof payload === 'string' || typeof payload === 'number' || typeof payload === 'boolean') {
    return [null, payload];
  }

  if (!isPayload(payload)) {
    return [new ServerError(500, `Unsupported value in API response: ${typeof payload}`), null];
  }

  if (!Object.hasOwn(payload, 'object')) {
    return [null, payload];
  }

  const tag = payload.object;
  const [errLoader, loader] = resolveLoader(typeof tag === 'string' ? tag : String(tag));
  if (errLoader) {
    return [errLoader, null];
  }

  if (opts.validation) {
    const [errValidate] = validator(payload, loader.schema);
    if (errValidate) {
      return [errValidate, null];
    }
  }

  const loaded = loader.load(payload, client);
  if (loaded instanceof NuclinoObject) {
    return [null, loaded];
  }

  return parseEach(loaded, client, opts);
}

function parseEach(
  entries: readonly unknown[],
  client: NuclinoClient,
  opts: ParseOptions,
): SafeWrap<NuclinoError, ParsedResponse[]> {
  const parsed: ParsedResponse[] = [];
  for (const entry of entries) {
    const [err, value] = parse(entry, client, opts);
    if (err) {
      return [err, null];
    }

    parsed.push(value);
  }

  return [null, parsed];
}
