import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 * Returns `null` when the timeout is disabled (`false` or `0`).
 */
export function createTimeoutSignal(timeoutMs?: number | false): AbortSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  // a pending timeout must not hold the process open once the request is done
  timeout.unref();
  controller.signal.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return controller.signal;
}

/** A merged signal plus the means to detach it from its sources. */
export interface LinkedSignal {
  signal: AbortSignal | null;
  /** Removes the listeners put on the sources; call once the work the signal guards has settled. */
  release: () => void;
}

const noop = () => undefined;

/**
 * Links several signals into one that aborts as soon as any source does,
 * carrying the source's reason (or an {@link AbortError} when it has none).
 * Nullish entries are skipped; a lone signal is returned as-is.
 *
 * Sources such as the client's dispose signal outlive every request, so the
 * listeners put on them must be released when the request settles.
 */
export function linkSignals(signals: Array<AbortSignal | null | undefined>): LinkedSignal {
  const active = signals.filter((s): s is AbortSignal => s != null);

  if (active.length <= 1) {
    return { signal: active[0] ?? null, release: noop };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    const reason: unknown = source.reason;
    controller.abort(reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', release, { once: true });

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
