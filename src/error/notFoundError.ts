import { isErrorType } from './isErrorType.js';

/**
 * Error representing a missing object (404), or a single-object lookup that matched nothing.
 */
export class NotFoundError extends Error {
  /** NotFoundError error-name */
  override name = 'NotFoundError';
  /** Error kind discriminant */
  readonly kind = 'NotFoundError';

  constructor(message = 'No such object exists', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}
