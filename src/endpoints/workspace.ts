import type { NuclinoClient } from '../core/client.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import { expectModel, expectModels } from '../models/narrow.js';
import type { Workspace } from '../models/workspace.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { PageParams } from './team.js';

/** Filters for {@link WorkspaceEndpoints.getWorkspaces} */
export interface GetWorkspacesParams extends PageParams {
  /** Only return workspaces of this team */
  teamId?: string;
}

/** Workspace-related API endpoints */
export class WorkspaceEndpoints {
  #client: NuclinoClient;

  constructor(client: NuclinoClient) {
    this.#client = client;
  }

  /**
   * Lists workspaces, optionally narrowed to one team.
   */
  async getWorkspaces({ teamId, limit, after }: GetWorkspacesParams = {}): SafeWrapAsync<NuclinoError, Workspace[]> {
    const [err, data] = await this.#client.get('/workspaces', { teamId, limit, after });
    if (err) {
      return [err, null];
    }

    return expectModels(data, 'workspace');
  }

  async getWorkspace(workspaceId: string): SafeWrapAsync<NuclinoError, Workspace> {
    const [err, data] = await this.#client.get(`/workspaces/${encodeURIComponent(workspaceId)}`);
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'workspace');
  }
}
