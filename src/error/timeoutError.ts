import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 * Only ever surfaces as the `cause` of a {@link ConnectionError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  override name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: ErrorOptions) {
    super(`error request timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
