import { isErrorType } from './isErrorType.js';

/**
 * Error representing a response this client can't make sense of: an unexpected
 * non-2xx status, or a success body that isn't the JSON shape asked for.
 */
export class ProtocolError extends Error {
  /** ProtocolError error-name */
  override name = 'ProtocolError';
  /** Error kind discriminant */
  readonly kind = 'ProtocolError';
  /** Status code of the offending response */
  readonly status: number;
  /** Raw body of the offending response, if one was read */
  readonly body: string | null;

  constructor(message: string, status: number, body: string | null, opts?: ErrorOptions) {
    super(message, opts);
    this.status = status;
    this.body = body;
  }
}

/**
 * Type guard for {@link ProtocolError}.
 */
export function isProtocolError(error: unknown): error is ProtocolError {
  return isErrorType(ProtocolError, error);
}
