import type { File } from './file.js';
import type { Collection, Item } from './item.js';
import type { Team } from './team.js';
import type { User } from './user.js';
import type { Workspace } from './workspace.js';

/** Tags of the objects a response can carry. */
export type ObjectTag = 'user' | 'team' | 'workspace' | 'item' | 'collection' | 'file';

/** Every domain object variant. */
export type AnyNuclinoObject = User | Team | Workspace | Item | Collection | File;

/**
 * Resolves the domain object class for one or more tags.
 *
 * @example
 * type Entry = ModelOf<'item' | 'collection'>; // Item | Collection
 */
export type ModelOf<T extends ObjectTag> = Extract<AnyNuclinoObject, { readonly tag: T }>;
