import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop"; `Infinity` never gives up.
   */
  attempts?: number;
  /** Milliseconds to wait between attempts. */
  timeout?: number;
  /** Called with each failure that is about to be retried. */
  onRetry?: (err: Error, attempt: number) => void;
}

/**
 * Retry-function to keep retrying a function that can error for X-number
 * attempts with a fixed wait between each attempt.
 *
 * `This is for functions that catches their own errors and return them in a tuple structure like [Error, Response]`
 *
 * @param fn function to retry
 * @param attempts number of retry-attempts we want to perform
 * @param timeout how long the wait-time should be
 * @param onRetry optional hook invoked before each wait
 */
export async function retry<R>({
  fn,
  attempts = Number.POSITIVE_INFINITY,
  timeout = 1000,
  onRetry,
}: RetryOptions<R>): SafeWrapAsync<RetryExhaustedError, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError(`error retries exhausted`, attempt, { cause: err }), null];
    }

    onRetry?.(err, attempt);
    await sleep(timeout);
  }
}
