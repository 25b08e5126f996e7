import { isErrorType } from './isErrorType.js';

/**
 * Error representing a transport failure before any response was obtained
 * (DNS/socket failure, timeout, abort). The underlying failure is kept as `cause`.
 */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  override name = 'ConnectionError';
  /** Error kind discriminant */
  readonly kind = 'ConnectionError';

  constructor(message = 'Unable to connect to host', opts?: ErrorOptions) {
    super(message, opts);
  }
}

/**
 * Type guard for {@link ConnectionError}.
 */
export function isConnectionError(error: unknown): error is ConnectionError {
  return isErrorType(ConnectionError, error);
}
