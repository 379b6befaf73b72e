import { AbortError } from '../error/abortError.js';

/** A merged abort signal and the function detaching it from its sources. */
export interface MergedSignal {
  signal: AbortSignal | null;
  /** Removes the listeners placed on the source signals. Safe to call more than once. */
  cleanup: () => void;
}

const noop = () => {};

/**
 * Combines abort signals into one that aborts as soon as any of them does, carrying that signal's `reason`
 * (or an {@link AbortError} when it has none).
 *
 * Nullish entries are skipped. `signal` is `null` for no signals and the signal itself for exactly one.
 * Listeners stay on the source signals until the merged signal aborts or `cleanup` is called, so callers
 * must call `cleanup` once the guarded work settles.
 */
export function mergeSignals(signals: ReadonlyArray<AbortSignal | null | undefined>): MergedSignal {
  const active = signals.filter((signal): signal is AbortSignal => signal !== null && signal !== undefined);
  if (active.length <= 1) {
    return { signal: active[0] ?? null, cleanup: noop };
  }

  const controller = new AbortController();
  const abortFrom = (source: AbortSignal) =>
    controller.abort(source.reason ?? new AbortError('error signal aborted without a reason'));

  const aborted = active.find((signal) => signal.aborted);
  if (aborted) {
    abortFrom(aborted);
    return { signal: controller.signal, cleanup: noop };
  }

  const removers = active.map((signal) => {
    const onAbort = () => abortFrom(signal);
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  });

  const cleanup = () => {
    for (const remove of removers.splice(0)) {
      remove();
    }
  };

  controller.signal.addEventListener('abort', cleanup, { once: true });

  return { signal: controller.signal, cleanup };
}
