import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is intentionally aborted, by a caller-supplied
 * signal or by disposing the client.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, following nested causes.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
