import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} once `timeoutMs` has passed.
 *
 * When `timeoutMs` is `false`, `0` or omitted, no signal is created and `null` is returned.
 * Once `settled` aborts, the timer is cleared and the signal never fires.
 */
export function createTimeoutSignal(timeoutMs?: number | false, settled?: AbortSignal): AbortSignal | null {
  if (!timeoutMs || settled?.aborted) {
    return null;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  // The timer alone must not keep the process alive
  timer.unref();
  controller.signal.addEventListener('abort', () => clearTimeout(timer), { once: true });
  settled?.addEventListener('abort', () => clearTimeout(timer), { once: true });

  return controller.signal;
}

/**
 * Merges several abort signals into one that aborts as soon as any source aborts.
 *
 * - Nullish entries are ignored; no remaining signal yields `null`.
 * - A single remaining signal is returned as-is.
 * - The source's `reason` is carried over, falling back to an {@link AbortError}.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((signal): signal is AbortSignal => signal !== null && signal !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0] ?? null;
  }

  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal aborted without a reason'));
  };

  controller.signal.addEventListener(
    'abort',
    () => {
      for (const remove of detach) {
        remove();
      }
    },
    { once: true },
  );

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const onAbort = () => abortFrom(signal);
    signal.addEventListener('abort', onAbort, { once: true });
    detach.push(() => signal.removeEventListener('abort', onAbort));
  }

  return controller.signal;
}
