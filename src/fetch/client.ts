import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HttpMethod,
} from './types.js';
import { mergeHeaderOptions, withQuery } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default and per-request headers,
 * - encodes query parameters and JSON bodies,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Non-2xx responses are not errors at this level; the status and body text are
 * handed back for the client core to classify.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default fetch options (headers). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request.
   *
   * @param url - Absolute url.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('get', url, opts);
  }

  /**
   * Executes a POST request with a JSON body.
   */
  public post(url: string, opts: Omit<FetchOptions, 'query'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('post', url, opts);
  }

  /**
   * Executes a PUT request with a JSON body.
   */
  public put(url: string, opts: Omit<FetchOptions, 'query'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('put', url, opts);
  }

  /**
   * Executes a DELETE request.
   */
  public delete(url: string, opts: Omit<FetchOptions, 'body' | 'query'>): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('delete', url, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`, with the original as `cause`.
   * - Failing to read the body is wrapped the same way.
   */
  async #request(method: HttpMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const verb = method.toUpperCase();
    const hasBody = opts.body !== undefined;
    const headers = mergeHeaderOptions(
      mergeHeaderOptions(this.#opts.headers, hasBody ? { 'Content-Type': 'application/json' } : undefined),
      opts.headers,
    );

    const [err, res] = await safeWrapAsync(() =>
      fetch(withQuery(url, opts.query), {
        method: verb,
        headers,
        ...(hasBody && { body: JSON.stringify(opts.body) }),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${verb} request in fetchClient`, { cause: err }), null];
    }

    const [errText, text] = await safeWrapAsync(() => res.text());
    if (errText) {
      return [new Error(`error reading ${verb} response body in fetchClient`, { cause: errText }), null];
    }

    return [null, { status: res.status, text }];
  }
}
