/**
 * Root entrypoint: re-exports the clients, domain objects, endpoints and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export { type Env, loadConfig } from './config.js';
export * from './core/index.js';
export * from './endpoints/index.js';
export * from './error/index.js';
export {
  FetchClient,
  type FetchClientOptions,
  type FetchClientProvider,
  type FetchClientProviderDefinition,
  type FetchOptions,
  type FetchResponse,
  type QueryParams,
} from './fetch/index.js';
export { RateGate, type RateGateOptions } from './limiter/index.js';
export * from './models/index.js';
export { createLogger, type LogLevel } from './utils/logger.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
