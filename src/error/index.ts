/**
 * Error entrypoint: exports the client's error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the client.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { AuthenticationError, isAuthenticationError } from './authenticationError.js';
export {
  classify,
  DEFAULT_RETRY_AFTER_SECONDS,
  type HeaderLookup,
  parseFieldErrors,
  parseRetryAfter,
} from './classify.js';
export { ConnectionError, isConnectionError } from './connectionError.js';
export { DecodeError, formatPath, getDecodeError, isDecodeError, type PathSegment } from './decodeError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export { isNotFoundError, NotFoundError } from './notFoundError.js';
export { isProtocolError, ProtocolError } from './protocolError.js';
export { getRateLimitError, isRateLimitError, RateLimitError } from './rateLimitError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { type ApiError, type ClientError, type ClientErrorKind, isApiError } from './types.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export {
  type FieldErrors,
  getValidationError,
  isValidationError,
  NON_FIELD_ERRORS,
  ValidationError,
} from './validationError.js';
