import { describe, expect, it } from 'vitest';
import { DecodeError, formatPath, getDecodeError, isDecodeError } from './decodeError.js';

describe('formatPath', () => {
  it('expect keys to be dotted and indices bracketed', () => {
    expect(formatPath([])).toBe('');
    expect(formatPath(['contact', 'uuid'])).toBe('contact.uuid');
    expect(formatPath(['groups', 1, 'name'])).toBe('groups[1].name');
  });
});

describe('DecodeError', () => {
  it('expect bare value error message', () => {
    const err = new DecodeError('expected integer', 'abc');

    expect(err.message).toBe('error decoding value: expected integer, got "abc"');
    expect(err.field).toBe('');
    expect(err.model).toBeNull();
    expect(err.kind).toBe('DecodeError');
  });

  it('expect at to prefix the path and name the model', () => {
    const inner = new DecodeError('expected non-empty string', '', { model: 'ObjectRef', path: ['uuid'] });
    const outer = inner.at('contact', 'Message');

    expect(outer.field).toBe('contact.uuid');
    expect(outer.model).toBe('Message');
    expect(outer.value).toBe('');
    expect(outer.message).toBe(`error decoding Message field 'contact.uuid': expected non-empty string, got ""`);
  });

  it('expect missing value to be described', () => {
    const err = new DecodeError('required field missing', undefined, { model: 'Contact', path: ['uuid'] });

    expect(err.message).toBe(`error decoding Contact field 'uuid': required field missing, got nothing`);
  });

  it('expect nested DecodeError to be found', () => {
    const err = new DecodeError('expected integer', 'x');
    const wrapped = new Error('outer', { cause: err });

    expect(isDecodeError(wrapped)).toBe(true);
    expect(getDecodeError(wrapped)).toBe(err);
  });
});
