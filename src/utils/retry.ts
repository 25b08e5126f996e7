import { AbortError } from '../error/abortError.js';
import { sleep } from './sleep.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<E extends Error, R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<E, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts: number;
  /**
   * Decides, per failure, how many milliseconds to wait before retrying.
   * Return `null` to stop and surface the error as-is.
   */
  delay: (err: E, attempt: number) => number | null;
  /** Called before each wait, with the wait in milliseconds. */
  onRetry?: (err: E, attempt: number, waitMs: number) => void;
  /** Aborts a pending wait. */
  signal?: AbortSignal | null;
}

/**
 * Keeps calling a tuple-returning function while `delay` asks for another go, up to `attempts` retries.
 * When retries run out the last error is returned unchanged. An abort during a wait
 * surfaces as an {@link AbortError} carrying the signal's reason.
 */
export async function retry<E extends Error, R>({
  fn,
  attempts,
  delay,
  onRetry,
  signal,
}: RetryOptions<E, R>): SafeWrapAsync<E | AbortError, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    const waitMs = attempt > attempts ? null : delay(err, attempt);
    if (waitMs === null) {
      return [err, null];
    }

    onRetry?.(err, attempt, waitMs);

    const [errSleep] = await safeWrapAsync(() => sleep(waitMs, signal));
    if (errSleep) {
      return [new AbortError('error retry wait aborted', { cause: errSleep }), null];
    }
  }
}
