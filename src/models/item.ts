import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import { FileEndpoints } from '../endpoints/file.js';
import {
  type CreateCollectionParams,
  type CreateItemParams,
  ItemEndpoints,
  type UpdateCollectionParams,
  type UpdateItemParams,
} from '../endpoints/item.js';
import { WorkspaceEndpoints } from '../endpoints/workspace.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { File } from './file.js';
import type { DeleteResponse } from './narrow.js';
import { NuclinoObject } from './object.js';
import { collectionShape, itemShape } from './schemas.js';
import type { Workspace } from './workspace.js';

/** A document in a workspace tree. */
export class Item extends NuclinoObject<'item', typeof itemShape> {
  readonly tag = 'item' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, itemShape);
  }

  get id() {
    return this.field('id');
  }

  get workspaceId() {
    return this.field('workspaceId');
  }

  get url() {
    return this.field('url');
  }

  get title() {
    return this.field('title');
  }

  get createdAt() {
    return this.field('createdAt');
  }

  get createdUserId() {
    return this.field('createdUserId');
  }

  get lastUpdatedAt() {
    return this.field('lastUpdatedAt');
  }

  get lastUpdatedUserId() {
    return this.field('lastUpdatedUserId');
  }

  /** Custom field values keyed by field name */
  get fields() {
    return this.field('fields');
  }

  /** Markdown content; only present when fetched individually */
  get content() {
    return this.field('content');
  }

  /** Ids of the items and files referenced from the content */
  get contentMeta() {
    return this.field('contentMeta');
  }

  /** Search highlight; only present on search results */
  get highlight() {
    return this.field('highlight');
  }

  async getWorkspace(): SafeWrapAsync<NuclinoError, Workspace> {
    const [err, workspaceId] = this.require('workspaceId');
    if (err) {
      return [err, null];
    }

    return new WorkspaceEndpoints(this.client).getWorkspace(workspaceId);
  }

  /**
   * Fetches the items and collections referenced from this item's content,
   * one call per id.
   */
  async getItems(): SafeWrapAsync<NuclinoError, Array<Item | Collection>> {
    const [err, contentMeta] = this.require('contentMeta');
    if (err) {
      return [err, null];
    }

    const items = new ItemEndpoints(this.client);
    return this.fetchEach(contentMeta.itemIds, (id) => items.getItem(id));
  }

  /**
   * Fetches the files attached to this item, one call per id.
   */
  async getFiles(): SafeWrapAsync<NuclinoError, File[]> {
    const [err, contentMeta] = this.require('contentMeta');
    if (err) {
      return [err, null];
    }

    const files = new FileEndpoints(this.client);
    return this.fetchEach(contentMeta.fileIds, (id) => files.getFile(id));
  }

  async update(params: UpdateItemParams): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).updateItem(id, params);
  }

  /** Moves this item to the trash. */
  async delete(): SafeWrapAsync<NuclinoError, DeleteResponse> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).deleteItem(id);
  }

  protected label(): string {
    return this.title ?? '';
  }
}

/** A folder-like entry grouping items and other collections. */
export class Collection extends NuclinoObject<'collection', typeof collectionShape> {
  readonly tag = 'collection' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, collectionShape);
  }

  get id() {
    return this.field('id');
  }

  get workspaceId() {
    return this.field('workspaceId');
  }

  get url() {
    return this.field('url');
  }

  get title() {
    return this.field('title');
  }

  get createdAt() {
    return this.field('createdAt');
  }

  get createdUserId() {
    return this.field('createdUserId');
  }

  get lastUpdatedAt() {
    return this.field('lastUpdatedAt');
  }

  get lastUpdatedUserId() {
    return this.field('lastUpdatedUserId');
  }

  get childIds() {
    return this.field('childIds');
  }

  /**
   * Fetches the direct children one by one, in tree order.
   */
  async getChildren(): SafeWrapAsync<NuclinoError, Array<Item | Collection>> {
    const [err, childIds] = this.require('childIds');
    if (err) {
      return [err, null];
    }

    const items = new ItemEndpoints(this.client);
    return this.fetchEach(childIds, (id) => items.getItem(id));
  }

  async getWorkspace(): SafeWrapAsync<NuclinoError, Workspace> {
    const [err, workspaceId] = this.require('workspaceId');
    if (err) {
      return [err, null];
    }

    return new WorkspaceEndpoints(this.client).getWorkspace(workspaceId);
  }

  /**
   * Creates an item, or a collection when `object` is `'collection'`, inside
   * this collection.
   */
  async createItem(
    params: Omit<CreateItemParams, 'workspaceId' | 'parentId'> = {},
  ): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).createItem({ ...params, parentId: id });
  }

  async createCollection(
    params: Omit<CreateCollectionParams, 'workspaceId' | 'parentId'> = {},
  ): SafeWrapAsync<NuclinoError, Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).createCollection({ ...params, parentId: id });
  }

  /** Renames this collection. */
  async update(params: UpdateCollectionParams): SafeWrapAsync<NuclinoError, Collection> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).updateCollection(id, params);
  }

  /** Moves this collection to the trash. */
  async delete(): SafeWrapAsync<NuclinoError, DeleteResponse> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).deleteCollection(id);
  }

  protected label(): string {
    return this.title ?? '';
  }
}
