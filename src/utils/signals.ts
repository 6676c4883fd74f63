import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Timeout signal together with the function that releases its timer. */
export interface TimeoutSignal {
  signal: AbortSignal | null;
  /** Clears the pending timer; safe to call more than once. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a
 * {@link TimeoutError} after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 * Call `clear` once the guarded work settles so no timer is left running.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal {
  if (!timeoutMs) {
    return { signal: null, clear: () => {} };
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/** Merged signal together with the function that detaches it from its sources. */
export interface MergedSignal {
  signal: AbortSignal | null;
  /** Removes the listeners put on the source signals; safe to call more than once. */
  dispose: () => void;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, the signal is `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Preserves the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 *
 * Sources can outlive the merged signal, so call `dispose` once the guarded
 * work settles; otherwise every merge leaves a listener on each source.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return { signal: null, dispose: () => {} };
  }

  if (active.length === 1) {
    return { signal: active[0] ?? null, dispose: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const dispose = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', dispose, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, dispose };
}
