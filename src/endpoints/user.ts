import type { NuclinoClient } from '../core/client.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import { expectModel } from '../models/narrow.js';
import type { User } from '../models/user.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** User-related API endpoints */
export class UserEndpoints {
  #client: NuclinoClient;

  constructor(client: NuclinoClient) {
    this.#client = client;
  }

  /**
   * Fetches a user by id.
   */
  async getUser(userId: string): SafeWrapAsync<NuclinoError, User> {
    const [err, data] = await this.#client.get(`/users/${encodeURIComponent(userId)}`);
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'user');
  }
}
