import type { NuclinoClient } from '../core/client.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import type { File } from '../models/file.js';
import { expectModel } from '../models/narrow.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** File-related API endpoints */
export class FileEndpoints {
  #client: NuclinoClient;

  constructor(client: NuclinoClient) {
    this.#client = client;
  }

  /**
   * Fetches a file's metadata, including a short-lived download url.
   */
  async getFile(fileId: string): SafeWrapAsync<NuclinoError, File> {
    const [err, data] = await this.#client.get(`/files/${encodeURIComponent(fileId)}`);
    if (err) {
      return [err, null];
    }

    return expectModel(data, 'file');
  }
}
