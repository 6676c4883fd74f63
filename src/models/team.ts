import type { NuclinoClient } from '../core/client.js';
import type { Payload } from '../core/types.js';
import { WorkspaceEndpoints } from '../endpoints/workspace.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { NuclinoObject } from './object.js';
import { teamShape } from './schemas.js';
import type { Workspace } from './workspace.js';

/** A team, the top of the workspace hierarchy. */
export class Team extends NuclinoObject<'team', typeof teamShape> {
  readonly tag = 'team' as const;

  constructor(props: Payload, client: NuclinoClient) {
    super(props, client, teamShape);
  }

  get id() {
    return this.field('id');
  }

  get url() {
    return this.field('url');
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

  /**
   * Fetches every workspace that belongs to this team.
   */
  async getWorkspaces(): SafeWrapAsync<NuclinoError, Workspace[]> {
    const [err, id] = this.require('id');
    if (err) {
      return [err, null];
    }

    return new WorkspaceEndpoints(this.client).getWorkspaces({ teamId: id });
  }

  protected label(): string {
    return this.name ?? '';
  }
}
