import type { Logger } from 'pino';
import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { LimitReachedError } from '../error/limitReachedError.js';
import type { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

const rateGateSchema = z.object({
  requestsPerMinute: z
    .number({ message: 'requestsPerMinute must be a number' })
    .int('requestsPerMinute must be an integer')
    .min(1, 'requestsPerMinute must be at least 1'),
  period: z.number().int().positive().default(60_000),
  retryInterval: z.number().nonnegative().default(1_000),
  maxRetries: z
    .number()
    .nonnegative()
    .refine((n) => Number.isInteger(n) || n === Number.POSITIVE_INFINITY, 'maxRetries must be an integer or Infinity')
    .default(Number.POSITIVE_INFINITY),
});

/** Options for {@link RateGate} */
export interface RateGateOptions {
  /** Admissions allowed inside one window */
  requestsPerMinute: number;
  /**
   * Window length in milliseconds.
   * @default 60000
   */
  period?: number;
  /**
   * Wait between rechecks while the window is full.
   * @default 1000
   */
  retryInterval?: number;
  /**
   * Rechecks before giving up. `Infinity` waits for as long as it takes.
   * @default Infinity
   */
  maxRetries?: number;
  /** Logger for wait notices. */
  logger?: Logger;
}

/**
 * Client-side request limiter over a sliding window of admission timestamps.
 *
 * `admit()` keeps rechecking on a fixed interval until the window has room.
 * Any error thrown while checking is treated like a full window and retried,
 * unless `maxRetries` caps the loop.
 */
export class RateGate {
  #limit: number;
  #period: number;
  #retryInterval: number;
  #maxRetries: number;
  #logger: Logger;
  /** Admission timestamps inside the current window, oldest first */
  #admissions: number[] = [];

  /** Creates a new gate, throws {@link ConfigurationError} on invalid options */
  constructor({ logger = defaultLogger, ...opts }: RateGateOptions) {
    const [err, parsed] = validator(opts, rateGateSchema);
    if (err) {
      throw new ConfigurationError('error invalid rate gate options', { cause: err });
    }

    this.#limit = parsed.requestsPerMinute;
    this.#period = parsed.period;
    this.#retryInterval = parsed.retryInterval;
    this.#maxRetries = parsed.maxRetries;
    this.#logger = logger;
  }

  /** Admissions allowed per window */
  get limit(): number {
    return this.#limit;
  }

  /** Admissions currently counted against the window */
  get used(): number {
    this.#prune(Date.now());
    return this.#admissions.length;
  }

  /**
   * Records an admission and returns its timestamp.
   *
   * @throws {LimitReachedError} when the window is full
   */
  check(): number {
    const now = Date.now();
    this.#prune(now);

    const oldest = this.#admissions[0];
    if (oldest !== undefined && this.#admissions.length >= this.#limit) {
      throw new LimitReachedError(this.#limit, oldest + this.#period - now);
    }

    this.#admissions.push(now);
    return now;
  }

  /**
   * Waits until the window admits another request and resolves with the
   * admission timestamp. Only fails when `maxRetries` is finite and used up.
   */
  admit(): SafeWrapAsync<RetryExhaustedError, number> {
    return retry({
      fn: async () => safeWrap(() => this.check()),
      attempts: this.#maxRetries,
      timeout: this.#retryInterval,
      onRetry: (err, attempt) => {
        if (attempt === 1) {
          this.#logger.warn(
            { reason: err.message, retryInterval: this.#retryInterval },
            'rate gate full, waiting for admission',
          );
          return;
        }

        this.#logger.debug({ attempt, reason: err.message }, 'rate gate recheck');
      },
    });
  }

  /** Forgets admissions that are a full period old */
  #prune(now: number) {
    while (this.#admissions.length > 0) {
      const oldest = this.#admissions[0];
      if (oldest === undefined || now - oldest < this.#period) {
        return;
      }

      this.#admissions.shift();
    }
  }
}
