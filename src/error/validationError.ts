import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Field name to the messages the server reported for it, in server order. */
export type FieldErrors = Readonly<Record<string, readonly string[]>>;

/** Key used for messages the server didn't attach to a field. */
export const NON_FIELD_ERRORS = 'non_field_errors';

/**
 * Error representing a request the server rejected as invalid (400), with its
 * per-field messages.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  override name = 'ValidationError';
  /** Error kind discriminant */
  readonly kind = 'ValidationError';
  /** Per-field validation messages */
  readonly errors: FieldErrors;

  constructor(errors: FieldErrors, opts?: ErrorOptions) {
    const messages = Object.values(errors).flat();
    super(messages.length ? messages.join('. ') : 'Request failed validation', opts);
    this.errors = errors;
  }

  /** Messages reported for one field, empty when it had none */
  messagesFor(field: string): readonly string[] {
    return this.errors[field] ?? [];
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
