import { AbortError } from '../error/abortError.js';

/**
 * Waits for the given number of milliseconds.
 *
 * Rejects with the signal's reason (or an {@link AbortError}) if the signal aborts first.
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(abortReason(signal));
    };

    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal | null): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new AbortError('error sleep aborted');
}
