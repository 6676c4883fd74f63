import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import { type CreateCollectionParams, type CreateItemParams, ItemEndpoints } from '../endpoints/item.js';
import { TeamEndpoints } from '../endpoints/team.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { Collection, Item } from './item.js';
import { NuclinoObject } from './object.js';
import { workspaceShape } from './schemas.js';
import type { Team } from './team.js';

/** A workspace: a tree of items and collections inside a team. */
export class Workspace extends NuclinoObject<'workspace', typeof workspaceShape> {
  readonly tag = 'workspace' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, workspaceShape);
  }

  get id() {
    return this.field('id');
  }

  get teamId() {
    return this.field('teamId');
  }

  get name() {
    return this.field('name');
  }

  get createdAt() {
    return this.field('createdAt');
  }

  get createdUserId() {
    return this.field('createdUserId');
  }

  /** Ids of the top-level entries */
  get childIds() {
    return this.field('childIds');
  }

  /** Custom field definitions */
  get fields() {
    return this.field('fields');
  }

  async getTeam(): SafeWrapAsync<NuclinoError, Team> {
    const [err, teamId] = this.require('teamId');
    if (err) {
      return [err, null];
    }

    return new TeamEndpoints(this.client).getTeam(teamId);
  }

  /**
   * Fetches the top-level entries one by one, in tree order.
   */
  async getChildren(): SafeWrapAsync<NuclinoError, Array<Item | Collection>> {
    const [err, childIds] = this.require('childIds');
    if (err) {
      return [err, null];
    }

    const items = new ItemEndpoints(this.client);
    return this.fetchEach(childIds, (id) => items.getItem(id));
  }

  /**
   * Creates an item, or a collection when `object` is `'collection'`, at the
   * root of this workspace.
   */
  async createItem(
    params: Omit<CreateItemParams, 'workspaceId' | 'parentId'> = {},
  ): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).createItem({ ...params, workspaceId: id });
  }

  async createCollection(
    params: Omit<CreateCollectionParams, 'workspaceId' | 'parentId'> = {},
  ): SafeWrapAsync<NuclinoError, Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).createCollection({ ...params, workspaceId: id });
  }

  protected label(): string {
    return this.name ?? '';
  }
}
