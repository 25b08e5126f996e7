import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('expect single message to be used as message', () => {
    const err = new ValidationError({ name: ['This field is required.'] });

    expect(err.message).toBe('This field is required.');
    expect(err.kind).toBe('ValidationError');
    expect(err.messagesFor('name')).toEqual(['This field is required.']);
    expect(err.messagesFor('urns')).toEqual([]);
  });

  it('expect multiple messages to be joined in order', () => {
    const err = new ValidationError({ name: ['Too long.'], urns: ['Invalid URN.', 'Duplicate URN.'] });

    expect(err.message).toBe('Too long.. Invalid URN.. Duplicate URN.');
  });

  it('expect empty errors to fall back to generic message', () => {
    expect(new ValidationError({}).message).toBe('Request failed validation');
  });

  it('expect shallow to correctly return true', () => {
    const err = new ValidationError({ name: ['x'] });

    expect(isErrorType(ValidationError, err)).toEqual(true);
    expect(isValidationError(err)).toEqual(true);
  });

  it('expect non ValidationError to return false', () => {
    expect(isValidationError(new Error('error'))).toEqual(false);
  });

  it('expect nested ValidationError to be unwrapped', () => {
    const validationErr = new ValidationError({ name: ['x'] });
    const err = new Error('error', { cause: validationErr });

    expect(unwrapErrorType(ValidationError, err)).toStrictEqual(validationErr);
    expect(getValidationError(err)).toStrictEqual(validationErr);
  });
});
