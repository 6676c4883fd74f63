import { loadConfig } from '../config.js';
import { FileEndpoints } from '../endpoints/file.js';
import {
  type CreateCollectionParams,
  type CreateItemParams,
  type GetItemsParams,
  ItemEndpoints,
  type UpdateCollectionParams,
  type UpdateItemParams,
} from '../endpoints/item.js';
import { type PageParams, TeamEndpoints } from '../endpoints/team.js';
import { UserEndpoints } from '../endpoints/user.js';
import { type GetWorkspacesParams, WorkspaceEndpoints } from '../endpoints/workspace.js';
import { ConfigurationError } from '../error/configurationError.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { File } from '../models/file.js';
import type { Collection, Item } from '../models/item.js';
import type { DeleteResponse } from '../models/narrow.js';
import type { Team } from '../models/team.js';
import type { User } from '../models/user.js';
import type { Workspace } from '../models/workspace.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { NuclinoClient, type NuclinoClientProps } from './client.js';

/**
 * Nuclino API client with every resource endpoint attached.
 *
 * @example
 * const nuclino = new Nuclino({ apiKey: process.env.NUCLINO_API_KEY ?? '' });
 * const [err, teams] = await nuclino.getTeams();
 */
export class Nuclino extends NuclinoClient {
  readonly users: UserEndpoints;
  readonly teams: TeamEndpoints;
  readonly workspaces: WorkspaceEndpoints;
  readonly items: ItemEndpoints;
  readonly files: FileEndpoints;

  constructor(props: NuclinoClientProps) {
    super(props);
    this.users = new UserEndpoints(this);
    this.teams = new TeamEndpoints(this);
    this.workspaces = new WorkspaceEndpoints(this);
    this.items = new ItemEndpoints(this);
    this.files = new FileEndpoints(this);
  }

  /**
   * Builds a client from `NUCLINO_*` environment variables; `overrides` win
   * over the environment.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<NuclinoClientProps> = {},
  ): SafeWrap<ConfigurationError, Nuclino> {
    const [errConfig, props] = loadConfig(env);
    if (errConfig) {
      return [errConfig, null];
    }

    const [err, client] = safeWrap(() => new Nuclino({ ...props, ...overrides }));
    if (err) {
      return [
        err instanceof ConfigurationError ? err : new ConfigurationError('error creating client', { cause: err }),
        null,
      ];
    }

    return [null, client];
  }

  getUser(userId: string): SafeWrapAsync<NuclinoError, User> {
    return this.users.getUser(userId);
  }

  getTeams(params?: PageParams): SafeWrapAsync<NuclinoError, Team[]> {
    return this.teams.getTeams(params);
  }

  getTeam(teamId: string): SafeWrapAsync<NuclinoError, Team> {
    return this.teams.getTeam(teamId);
  }

  getWorkspaces(params?: GetWorkspacesParams): SafeWrapAsync<NuclinoError, Workspace[]> {
    return this.workspaces.getWorkspaces(params);
  }

  getWorkspace(workspaceId: string): SafeWrapAsync<NuclinoError, Workspace> {
    return this.workspaces.getWorkspace(workspaceId);
  }

  getItems(params: GetItemsParams): SafeWrapAsync<NuclinoError, Array<Item | Collection>> {
    return this.items.getItems(params);
  }

  getItem(itemId: string): SafeWrapAsync<NuclinoError, Item | Collection> {
    return this.items.getItem(itemId);
  }

  createItem(params: CreateItemParams): SafeWrapAsync<NuclinoError, Item | Collection> {
    return this.items.createItem(params);
  }

  updateItem(itemId: string, params: UpdateItemParams): SafeWrapAsync<NuclinoError, Item | Collection> {
    return this.items.updateItem(itemId, params);
  }

  deleteItem(itemId: string): SafeWrapAsync<NuclinoError, DeleteResponse> {
    return this.items.deleteItem(itemId);
  }

  getCollection(collectionId: string): SafeWrapAsync<NuclinoError, Collection> {
    return this.items.getCollection(collectionId);
  }

  createCollection(params: CreateCollectionParams): SafeWrapAsync<NuclinoError, Collection> {
    return this.items.createCollection(params);
  }

  updateCollection(collectionId: string, params: UpdateCollectionParams): SafeWrapAsync<NuclinoError, Collection> {
    return this.items.updateCollection(collectionId, params);
  }

  deleteCollection(collectionId: string): SafeWrapAsync<NuclinoError, DeleteResponse> {
    return this.items.deleteCollection(collectionId);
  }

  getFile(fileId: string): SafeWrapAsync<NuclinoError, File> {
    return this.files.getFile(fileId);
  }
}

/**
 * Opens a client for the duration of `fn` and closes it on every exit path,
 * including a rejection from `fn`.
 *
 * @throws {ConfigurationError} when `props` are invalid
 */
export async function withNuclino<T>(props: NuclinoClientProps, fn: (nuclino: Nuclino) => Promise<T>): Promise<T> {
  const nuclino = new Nuclino(props);
  try {
    return await fn(nuclino);
  } finally {
    nuclino.close();
  }
}
