import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request rejected because the org exceeded its request rate (429).
 */
export class RateLimitError extends Error {
  /** RateLimitError error-name */
  override name = 'RateLimitError';
  /** Error kind discriminant */
  readonly kind = 'RateLimitError';
  /** Seconds the server asked us to wait before the next request */
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, opts?: ErrorOptions) {
    super(
      'You have exceeded the number of requests allowed per org in a given time window. ' +
        `Please wait ${retryAfterSeconds} seconds before making further requests`,
      opts,
    );
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Type guard for {@link RateLimitError}.
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return isErrorType(RateLimitError, error);
}

/**
 * Extract a {@link RateLimitError} from an unknown error value, following nested causes.
 */
export function getRateLimitError(error: unknown): RateLimitError | null {
  return unwrapErrorType(RateLimitError, error);
}
