import { isErrorType } from './isErrorType.js';

/**
 * Error representing a rejected credential (401 or 403).
 */
export class AuthenticationError extends Error {
  /** AuthenticationError error-name */
  override name = 'AuthenticationError';
  /** Error kind discriminant */
  readonly kind = 'AuthenticationError';
  /** Status code the server answered with */
  readonly status: number;

  constructor(status: number, message = 'Authentication with provided token failed', opts?: ErrorOptions) {
    super(message, opts);
    this.status = status;
  }
}

/**
 * Type guard for {@link AuthenticationError}.
 */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return isErrorType(AuthenticationError, error);
}
