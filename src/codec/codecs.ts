import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError, type PathSegment } from '../error/decodeError.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { Timestamp } from './timestamp.js';

/**
 * Bidirectional conversion between a wire value and a typed value for one field.
 */
export interface Codec<T> {
  /** Short description of the accepted wire value, used in error messages */
  readonly expected: string;
  /** Converts a raw JSON value, failing with a {@link DecodeError} on anything unexpected. */
  decode(raw: unknown): SafeWrap<DecodeError, T>;
  /** Converts a typed value back to its wire form. */
  encode(value: T): JsonValue;
}

/** Value type carried by a codec. */
export type CodecValue<C> = C extends Codec<infer T> ? T : never;

/** What {@link object} needs from a model. */
export interface NestedModel<T> {
  readonly name: string;
  materialize(raw: unknown): SafeWrap<DecodeError, T>;
  serialize(value: T): JsonObject;
}

/** Narrows to a plain JSON object (not an array, not null). */
export function isJsonObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function primitive<T extends JsonValue>(expected: string, accept: (raw: unknown) => raw is T): Codec<T> {
  return Object.freeze({
    expected,
    decode(raw: unknown): SafeWrap<DecodeError, T> {
      return accept(raw) ? [null, raw] : [new DecodeError(`expected ${expected}`, raw), null];
    },
    encode(value: T): JsonValue {
      return value;
    },
  });
}

const isString = (raw: unknown): raw is string => typeof raw === 'string';

/** Non-empty string; no further structural check. */
export function identifier(): Codec<string> {
  return primitive('non-empty string', (raw): raw is string => isString(raw) && raw.length > 0);
}

/** Any string, empty included. */
export function string(): Codec<string> {
  return primitive('string', isString);
}

/** JSON number holding a safe integer. Fractions and unsafe magnitudes fail. */
export function integer(): Codec<number> {
  return primitive('integer', (raw): raw is number => Number.isSafeInteger(raw));
}

/** Any finite JSON number. */
export function number(): Codec<number> {
  return primitive('number', (raw): raw is number => typeof raw === 'number' && Number.isFinite(raw));
}

/** JSON boolean only; `"true"` and `1` fail. */
export function boolean(): Codec<boolean> {
  return primitive('boolean', (raw): raw is boolean => typeof raw === 'boolean');
}

/** String that must be one of `members`. */
export function enumeration<const Members extends readonly string[]>(members: Members): Codec<Members[number]> {
  const allowed: ReadonlySet<string> = new Set(members);
  return primitive(`one of ${members.join(', ')}`, (raw): raw is Members[number] => isString(raw) && allowed.has(raw));
}

/** ISO-8601 date-time to {@link Timestamp}; encodes as canonical UTC. */
export function timestamp(): Codec<Timestamp> {
  const expected = 'ISO-8601 timestamp';
  return Object.freeze({
    expected,
    decode(raw: unknown): SafeWrap<DecodeError, Timestamp> {
      const parsed = isString(raw) ? Timestamp.parse(raw) : null;
      return parsed ? [null, parsed] : [new DecodeError(`expected ${expected}`, raw), null];
    },
    encode(value: Timestamp): JsonValue {
      return value.toISOString();
    },
  });
}

/** Nested typed object, decoded by another model. */
export function object<T>(model: NestedModel<T>): Codec<T> {
  return Object.freeze({
    expected: model.name,
    decode(raw: unknown): SafeWrap<DecodeError, T> {
      return model.materialize(raw);
    },
    encode(value: T): JsonValue {
      return model.serialize(value);
    },
  });
}

/** Order-preserving list; `[]` is a valid value. */
export function list<T>(item: Codec<T>): Codec<readonly T[]> {
  const expected = `list of ${item.expected}`;
  return Object.freeze({
    expected,
    decode(raw: unknown): SafeWrap<DecodeError, readonly T[]> {
      if (!Array.isArray(raw)) {
        return [new DecodeError(`expected ${expected}`, raw), null];
      }

      const out: T[] = [];
      for (const [index, value] of raw.entries()) {
        const [err, decoded] = item.decode(value);
        if (err) {
          return [err.at(index), null];
        }

        out.push(decoded);
      }

      return [null, Object.freeze(out)];
    },
    encode(value: readonly T[]): JsonValue {
      return value.map((entry) => item.encode(entry));
    },
  });
}

/** String-keyed map of another codec. */
export function record<T>(value: Codec<T>): Codec<Readonly<Record<string, T>>> {
  const expected = `object of ${value.expected}`;
  return Object.freeze({
    expected,
    decode(raw: unknown): SafeWrap<DecodeError, Readonly<Record<string, T>>> {
      if (!isJsonObject(raw)) {
        return [new DecodeError(`expected ${expected}`, raw), null];
      }

      const out: Record<string, T> = {};
      for (const [key, entry] of Object.entries(raw)) {
        const [err, decoded] = value.decode(entry);
        if (err) {
          return [err.at(key), null];
        }

        out[key] = decoded;
      }

      return [null, Object.freeze(out)];
    },
    encode(entries: Readonly<Record<string, T>>): JsonValue {
      const out: JsonObject = {};
      for (const [key, entry] of Object.entries(entries)) {
        out[key] = value.encode(entry);
      }

      return out;
    },
  });
}

function issuePath(issue: StandardSchemaV1.Issue): PathSegment[] {
  return (issue.path ?? []).map((segment) => {
    const key = typeof segment === 'object' ? segment.key : segment;
    return typeof key === 'number' ? key : String(key);
  });
}

/**
 * Free-form field checked by any synchronous Standard Schema (a zod schema, for instance).
 * Encodes as-is.
 */
export function schema<T extends JsonValue>(standard: StandardSchemaV1<unknown, T>): Codec<T> {
  const expected = `value accepted by ${standard['~standard'].vendor} schema`;
  return Object.freeze({
    expected,
    decode(raw: unknown): SafeWrap<DecodeError, T> {
      const [errValidate, result] = safeWrap(() => standard['~standard'].validate(raw));
      if (errValidate) {
        return [new DecodeError('schema validation threw', raw, {}, { cause: errValidate }), null];
      }

      if (result instanceof Promise) {
        return [new DecodeError('asynchronous schemas are not supported', raw), null];
      }

      if (result.issues) {
        const [issue] = result.issues;
        const path = issue ? issuePath(issue) : [];
        return [new DecodeError(issue?.message ?? `expected ${expected}`, raw, { path }), null];
      }

      return [null, result.value];
    },
    encode(value: T): JsonValue {
      return value;
    },
  });
}
