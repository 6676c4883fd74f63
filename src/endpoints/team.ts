import type { NuclinoClient } from '../core/client.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import { expectModel, expectModels } from '../models/narrow.js';
import type { Team } from '../models/team.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Pagination accepted by list endpoints. */
export interface PageParams {
  /** Number between 1 and 100 limiting the results */
  limit?: number;
  /** Only return entries that come after this id */
  after?: string;
}

/** Team-related API endpoints */
export class TeamEndpoints {
  #client: NuclinoClient;

  constructor(client: NuclinoClient) {
    this.#client = client;
  }

  /**
   * Lists the teams the API key has access to.
   */
  async getTeams({ limit, after }: PageParams = {}): SafeWrapAsync<NuclinoError, Team[]> {
    const [err, data] = await this.#client.get('/teams', { limit, after });
    if (err) {
      return [err, null];
    }

    return expectModels(data, 'team');
  }

  async getTeam(teamId: string): SafeWrapAsync<NuclinoError, Team> {
    const [err, data] = await this.#client.get(`/teams/${encodeURIComponent(teamId)}`);
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'team');
  }
}
