import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import { ItemEndpoints } from '../endpoints/item.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { Collection, Item } from './item.js';
import { NuclinoObject } from './object.js';
import { fileShape } from './schemas.js';

/** A file attached to an item. */
export class File extends NuclinoObject<'file', typeof fileShape> {
  readonly tag = 'file' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, fileShape);
  }

  get id() {
    return this.field('id');
  }

  get itemId() {
    return this.field('itemId');
  }

  get fileName() {
    return this.field('fileName');
  }

  get createdAt() {
    return this.field('createdAt');
  }

  get createdUserId() {
    return this.field('createdUserId');
  }

  /** Download url and its expiry */
  get download() {
    return this.field('download');
  }

  /**
   * Fetches the item this file is attached to.
   */
  async getItem(): SafeWrapAsync<NuclinoError, Item | Collection> {
    const [err, itemId] = this.require('itemId');
    if (err) {
      return [err, null];
    }

    return new ItemEndpoints(this.client).getItem(itemId);
  }

  protected label(): string {
    return this.fileName ?? '';
  }
}
