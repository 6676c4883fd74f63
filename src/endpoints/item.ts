import type { NuclinoClient } from '../core/client.js';
import { ValidationError } from '../error/httpError.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { Collection, Item } from '../models/item.js';
import { type DeleteResponse, expectDeleted, expectModel, expectModels } from '../models/narrow.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { PageParams } from './team.js';

/** Filters for {@link ItemEndpoints.getItems}; exactly one of `teamId` and `workspaceId` is required. */
export interface GetItemsParams extends PageParams {
  teamId?: string;
  workspaceId?: string;
}

/** Where a new entry goes: a workspace root or a parent collection. */
export interface Placement {
  workspaceId?: string;
  parentId?: string;
}

/** Options for {@link ItemEndpoints.createItem} */
export interface CreateItemParams extends Placement {
  /** @default 'item' */
  object?: 'item' | 'collection';
  title?: string;
  /** Markdown content, items only */
  content?: string;
  /** Position among the parent's children */
  index?: number;
}

/** Options for {@link ItemEndpoints.createCollection} */
export type CreateCollectionParams = Omit<CreateItemParams, 'object' | 'content'>;

/** Options for {@link ItemEndpoints.updateItem} */
export interface UpdateItemParams {
  title?: string;
  content?: string;
}

/** Options for {@link ItemEndpoints.updateCollection} */
export type UpdateCollectionParams = Omit<UpdateItemParams, 'content'>;

/** Item and collection endpoints */
export class ItemEndpoints {
  #client: NuclinoClient;

  constructor(client: NuclinoClient) {
    this.#client = client;
  }

  /**
   * Lists items and collections of a team or a workspace.
   *
   * Fails locally with a 400 {@link ValidationError}, without a request, unless
   * exactly one of `teamId` and `workspaceId` is given.
   */
  async getItems({
    teamId,
    workspaceId,
    limit,
    after,
  }: GetItemsParams = {}): SafeWrapAsync<NuclinoError, Array<Item | Collection>> {
    if (teamId === undefined && workspaceId === undefined) {
      return [new ValidationError(400, 'Must specify either teamId or workspaceId'), null];
    }

    if (teamId !== undefined && workspaceId !== undefined) {
      return [new ValidationError(400, 'Cannot specify both teamId and workspaceId'), null];
    }

    const [err, data] = await this.#client.get('/items', { teamId, workspaceId, limit, after });
    if (err) {
      return [err, null];
    }

    return expectModels(data, 'item', 'collection');
  }

  async getItem(itemId: string): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, data] = await this.#client.get(this.#path(itemId));
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'item', 'collection');
  }

  /**
   * Creates an item, or a collection when `object` is `'collection'`.
   */
  async createItem({
    object = 'item',
    workspaceId,
    parentId,
    title,
    content,
    index,
  }: CreateItemParams): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, data] = await this.#client.post('/items', { object, workspaceId, parentId, title, content, index });
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'item', 'collection');
  }

  /**
   * Updates title and/or content. Omitted fields are left as they are.
   */
  async updateItem(itemId: string, { title, content }: UpdateItemParams): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, data] = await this.#client.put(this.#path(itemId), { title, content });
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'item', 'collection');
  }

  /**
   * Moves an item or collection to the trash.
   */
  async deleteItem(itemId: string): SafeWrapAsync<NuclinoError, DeleteResponse> {
    const [err, data] = await this.#client.delete(this.#path(itemId));
    if (err) {
      return [err, null];
    }

    return expectDeleted(data);
  }

  async getCollection(collectionId: string): SafeWrapAsync<NuclinoError, Collection> {
    const [err, data] = await this.#client.get(this.#path(collectionId));
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'collection');
  }

  async createCollection({
    workspaceId,
    parentId,
    title,
    index,
  }: CreateCollectionParams): SafeWrapAsync<NuclinoError, Collection> {
    const [err, data] = await this.#client.post('/items', {
      object: 'collection',
      workspaceId,
      parentId,
      title,
      index,
    });
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'collection');
  }

  async updateCollection(collectionId: string, { title }: UpdateCollectionParams): SafeWrapAsync<NuclinoError, Collection> {
    const [err, data] = await this.#client.put(this.#path(collectionId), { title });
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'collection');
  }

  deleteCollection(collectionId: string): SafeWrapAsync<NuclinoError, DeleteResponse> {
    return this.deleteItem(collectionId);
  }

  #path(id: string): string {
    return `/items/${encodeURIComponent(id)}`;
  }
}
