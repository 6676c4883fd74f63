import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper, `undefined` removes a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | undefined>;

/** HTTP verbs the API is called with. */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

/** Scalar query-string value; `null` and `undefined` entries are skipped. */
export type QueryValue = string | number | boolean | null | undefined;

/** Query-string parameters for GET requests. */
export type QueryParams = Readonly<Record<string, QueryValue>>;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Query-string parameters appended to the url. */
  query?: QueryParams;
  /** JSON-encodable request body. */
  body?: unknown;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/**
 * What the transport hands back: the status and the raw body text. Parsing
 * and status handling happen in the client core.
 */
export interface FetchResponse {
  status: number;
  text: string;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
}

/** Contract for HTTP client implementations used by the client core. */
export interface FetchClientProviderDefinition {
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<Error, FetchResponse>;
  post: (url: string, options: Omit<FetchOptions, 'query'>) => SafeWrapAsync<Error, FetchResponse>;
  put: (url: string, options: Omit<FetchOptions, 'query'>) => SafeWrapAsync<Error, FetchResponse>;
  delete: (url: string, options: Omit<FetchOptions, 'body' | 'query'>) => SafeWrapAsync<Error, FetchResponse>;
  /** Releases held resources, called once when the owning client closes. */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  new (opts?: FetchClientOptions): FetchClientProviderDefinition;
}
