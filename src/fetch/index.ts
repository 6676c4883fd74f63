/**
 * Fetch entrypoint: exports the default transport and the provider contract.
 * @module
 */
export { FetchClient } from './client.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
  HttpMethod,
  QueryParams,
  QueryValue,
} from './types.js';
export { mergeHeaderOptions, withQuery } from './utils.js';
