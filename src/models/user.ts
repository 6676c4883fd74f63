import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import { NuclinoObject } from './object.js';
import { userShape } from './schemas.js';

/** A Nuclino user. */
export class User extends NuclinoObject<'user', typeof userShape> {
  readonly tag = 'user' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, userShape);
  }

  get id() {
    return this.field('id');
  }

  get firstName() {
    return this.field('firstName');
  }

  get lastName() {
    return this.field('lastName');
  }

  get email() {
    return this.field('email');
  }

  get avatarUrl() {
    return this.field('avatarUrl');
  }

  protected label(): string {
    return `${this.firstName ?? ''} ${this.lastName ?? ''}`;
  }
}
