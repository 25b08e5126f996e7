import { AuthenticationError } from './authenticationError.js';
import { ConnectionError } from './connectionError.js';
import type { DecodeError } from './decodeError.js';
import { NotFoundError } from './notFoundError.js';
import { ProtocolError } from './protocolError.js';
import { RateLimitError } from './rateLimitError.js';
import { ValidationError } from './validationError.js';

/** Every failure a request against the API can end in. */
export type ApiError =
  | ConnectionError
  | AuthenticationError
  | ValidationError
  | NotFoundError
  | RateLimitError
  | ProtocolError;

/** Every failure surfaced by the client, API or decoding. */
export type ClientError = ApiError | DecodeError;

/** Discriminant of {@link ClientError}. */
export type ClientErrorKind = ClientError['kind'];

/**
 * Type guard for {@link ApiError}. Shallow: causes are not followed, since API
 * errors are always returned as-is.
 */
export function isApiError(error: unknown): error is ApiError {
  return (
    error instanceof ConnectionError ||
    error instanceof AuthenticationError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof RateLimitError ||
    error instanceof ProtocolError
  );
}
