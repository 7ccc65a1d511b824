import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal paired with a function that releases its timer or listeners. */
export interface DisposableSignal {
  signal: AbortSignal;
  /** Releases timers/listeners without aborting. Safe to call more than once. */
  release: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort with a
 * {@link TimeoutError} after the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 * The timer is unref'd so a pending timeout never keeps the process alive.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 */
export function createTimeoutSignal(timeoutMs?: number | false): DisposableSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);
  timer.unref();

  controller.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });

  return { signal: controller.signal, release: () => clearTimeout(timer) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is with a no-op `release`.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort, preserving the
 *   source `reason` (or an {@link AbortError} when it has none).
 * - `release` detaches the listeners from long-lived sources once the
 *   request has settled.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): DisposableSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return { signal: active[0], release: () => {} };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    release();
    controller.abort(source.reason ?? new AbortError('signal aborted with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
