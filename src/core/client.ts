import type { Logger } from 'pino';
import { z } from 'zod';
import { AbortError } from '../error/abortError.js';
import { classifyStatus } from '../error/classifyStatus.js';
import { ConfigurationError } from '../error/configurationError.js';
import { NetworkError } from '../error/networkError.js';
import type { NuclinoError } from '../error/nuclinoError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { unwrapErrorType } from '../error/unwrapErrorType.js';
import { FetchClient } from '../fetch/client.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HttpMethod,
  QueryParams,
} from '../fetch/types.js';
import { RateGate } from '../limiter/rateGate.js';
import { joinUrl } from '../utils/joinUrl.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { tryParse } from '../utils/tryParse.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { parse } from './dispatch.js';
import { isPayload, type ParsedResponse, type RequestBody } from './types.js';

/** Default API root. */
export const BASE_URL = 'https://api.nuclino.com/v0';

const clientSchema = z.object({
  apiKey: z.string({ message: 'API key is required' }).min(1, 'API key cannot be empty'),
  baseUrl: z.string().min(1, 'baseUrl cannot be empty').default(BASE_URL),
  requestsPerMinute: z
    .number()
    .int('requestsPerMinute must be an integer')
    .min(1, 'requestsPerMinute must be at least 1')
    .default(140),
  timeout: z.union([z.number().int().positive(), z.literal(false)]).default(60_000),
  validation: z.boolean().default(false),
});

/** Tuning for the client-side rate gate. */
export interface RateLimitOptions {
  /**
   * Wait between admission rechecks, in milliseconds.
   * @default 1000
   */
  retryInterval?: number;
  /**
   * Rechecks before a call fails with `RetryExhaustedError`.
   * @default Infinity
   */
  maxRetries?: number;
}

/** Configuration for constructing a {@link NuclinoClient}. */
export interface NuclinoClientProps {
  /** API key, sent verbatim as the `Authorization` header. */
  apiKey: string;
  /**
   * API root every path is joined to.
   * @default 'https://api.nuclino.com/v0'
   */
  baseUrl?: string;
  /**
   * Client-side cap on requests per rolling minute.
   * @default 140
   */
  requestsPerMinute?: number;
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /**
   * Validate tagged response payloads against their schemas.
   * @default false
   */
  validation?: boolean;
  /** Rate gate tuning. */
  rateLimit?: RateLimitOptions;
  /** HTTP client implementation. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Logger for request and rate gate diagnostics. */
  logger?: Logger;
}

/**
 * Client core: owns the transport and the rate gate, and turns raw responses
 * into domain objects.
 *
 * Primitives run one at a time, in call order. Each one waits for the rate
 * gate, sends a single request and resolves with an error-first tuple; errors
 * are never thrown.
 */
export class NuclinoClient {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  #rateGate: RateGate;
  #logger: Logger;
  #baseUrl: string;
  #timeout: number | false;
  #validation: boolean;
  /** Global abort-controller for closing */
  #abortController = new AbortController();
  #closed = false;
  /** Tail of the request queue */
  #queue: Promise<void> = Promise.resolve();

  /**
   * Creates a client.
   *
   * @throws {ConfigurationError} when an option is invalid
   */
  constructor({ fetchProvider = FetchClient, logger = defaultLogger, rateLimit, ...props }: NuclinoClientProps) {
    const [err, opts] = validator(props, clientSchema);
    if (err) {
      throw new ConfigurationError('error invalid client options', { cause: err });
    }

    this.#logger = logger;
    this.#baseUrl = opts.baseUrl;
    this.#timeout = opts.timeout;
    this.#validation = opts.validation;
    this.#rateGate = new RateGate({ ...rateLimit, requestsPerMinute: opts.requestsPerMinute, logger });
    this.#fetchClient = new fetchProvider({
      headers: {
        Authorization: opts.apiKey,
        Accept: 'application/json',
      },
    });
  }

  /** API root requests are sent to */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Whether {@link NuclinoClient.close} has been called */
  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Performs a GET request.
   *
   * @param path - Path below the base url, e.g. `/items`.
   * @param params - Query parameters; nullish values are left out.
   * @returns A promise resolving to `[error, data]`.
   */
  get(path: string, params?: QueryParams): SafeWrapAsync<NuclinoError, ParsedResponse> {
    return this.#serialize(() => this.#request('get', path, { query: params }));
  }

  /**
   * Performs a DELETE request.
   */
  delete(path: string): SafeWrapAsync<NuclinoError, ParsedResponse> {
    return this.#serialize(() => this.#request('delete', path, {}));
  }

  /**
   * Performs a POST request with a JSON body.
   */
  post(path: string, body: RequestBody): SafeWrapAsync<NuclinoError, ParsedResponse> {
    return this.#serialize(() => this.#request('post', path, { body }));
  }

  /**
   * Performs a PUT request with a JSON body.
   */
  put(path: string, body: RequestBody): SafeWrapAsync<NuclinoError, ParsedResponse> {
    return this.#serialize(() => this.#request('put', path, { body }));
  }

  /**
   * Aborts in-flight requests and releases the transport. Calls made
   * afterwards resolve with an {@link AbortError}. Safe to call more than once.
   */
  close() {
    if (this.#closed) {
      return;
    }

    this.#closed = true;
    this.#abortController.abort(new AbortError('error client was closed'));
    this.#fetchClient.dispose?.();
    this.#logger.debug('client closed');
  }

  /** Chains a task behind every call made before it */
  #serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.#queue.then(task);
    this.#queue = run.then(
      () => undefined,
      () => undefined,
    );

    return run;
  }

  /**
   * One primitive call: admission, transport, then response handling.
   */
  async #request(method: HttpMethod, path: string, opts: FetchOptions): SafeWrapAsync<NuclinoError, ParsedResponse> {
    if (this.#closed) {
      return [new AbortError('error client was closed'), null];
    }

    const [errAdmit] = await this.#rateGate.admit();
    if (errAdmit) {
      return [errAdmit, null];
    }

    // Closed while waiting for admission
    if (this.#closed) {
      return [new AbortError('error client was closed'), null];
    }

    const verb = method.toUpperCase();
    const url = joinUrl(this.#baseUrl, path);
    const timeout = createTimeoutSignal(this.#timeout);
    const { signal, dispose } = mergeSignals([timeout.signal, this.#abortController.signal]);

    this.#logger.debug({ method: verb, url }, 'sending request');
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#fetchClient[method](url, { ...opts, ...(signal && { signal }) }),
    );
    timeout.clear();
    dispose();

    if (errWrapped) {
      return [this.#transportError(verb, url, errWrapped, signal), null];
    }

    const [errFetch, response] = wrapped;
    if (errFetch) {
      return [this.#transportError(verb, url, errFetch, signal), null];
    }

    this.#logger.debug({ method: verb, url, status: response.status }, 'received response');
    return this.#handleResponse(response);
  }

  /**
   * Classifies a response that arrived: unparseable bodies, failed statuses
   * and envelopes without `data` become API errors, the rest is dispatched.
   */
  #handleResponse({ status, text }: FetchResponse): SafeWrap<NuclinoError, ParsedResponse> {
    const [errJson, body] = tryParse(text);
    if (errJson) {
      // Below 400 the status claims success, so an unreadable body is reported as a server fault
      return [classifyStatus(status >= 400 ? status : 500, 'Invalid JSON response from API', { rawContent: text }), null];
    }

    const responseData = isPayload(body) ? body : { rawContent: text };
    if (status !== 200) {
      const message = isPayload(body) && typeof body.message === 'string' ? body.message : 'Unknown error';
      return [classifyStatus(status, message, responseData), null];
    }

    if (!isPayload(body) || !Object.hasOwn(body, 'data')) {
      return [classifyStatus(500, "API response missing 'data' field", responseData), null];
    }

    return parse(body.data, this, { validation: this.#validation });
  }

  /**
   * Maps a failed transport call onto the error taxonomy. The merged signal's
   * reason tells a timeout apart from a close.
   */
  #transportError(verb: string, url: string, err: Error, signal: AbortSignal | null): NuclinoError {
    const reason: unknown = signal?.aborted ? signal.reason : undefined;

    const timeoutError = unwrapErrorType(TimeoutError, reason) ?? unwrapErrorType(TimeoutError, err);
    if (timeoutError) {
      return timeoutError;
    }

    const abortError = unwrapErrorType(AbortError, reason) ?? unwrapErrorType(AbortError, err);
    if (abortError) {
      return abortError;
    }

    return new NetworkError(`error sending ${verb} request to ${url}`, { cause: err });
  }
}
