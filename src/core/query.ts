import { Timestamp } from '../codec/timestamp.js';
import type { JsonObject, JsonValue } from '../types/json.js';

/** Anything that refers to an API object: a typed object carrying `uuid`, `key` or `id`. */
export interface Reference {
  readonly uuid?: string;
  readonly key?: string;
  readonly id?: number;
}

/** Values accepted for filters, identifiers and request payload fields. */
export type WireInput =
  | string
  | number
  | boolean
  | Date
  | Timestamp
  | Reference
  | null
  | undefined
  | readonly WireInput[];

/** One serialized query-string parameter. */
export type QueryParam = readonly [name: string, value: string];

function isReference(value: object): value is Reference {
  return 'uuid' in value || 'key' in value || 'id' in value;
}

/**
 * Converts a value to its JSON wire form: timestamps to canonical UTC strings,
 * references to their `uuid`, else `key`, else `id`. `null`/`undefined` (and a
 * reference carrying none of those) come back as `undefined`.
 */
export function toWireValue(value: WireInput): JsonValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (Array.isArray(value)) {
    return value.map(toWireValue).filter((item): item is JsonValue => item !== undefined);
  }

  if (value instanceof Date) {
    return Timestamp.fromDate(value).toISOString();
  }

  if (value instanceof Timestamp) {
    return value.toISOString();
  }

  if (typeof value === 'object') {
    if (!isReference(value)) {
      return undefined;
    }

    return value.uuid ?? value.key ?? value.id;
  }

  return value;
}

function toParamString(value: JsonValue): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }

  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Serializes filters into ordered query parameters. Absent values are dropped,
 * booleans become `1`/`0` and lists repeat the parameter once per item.
 */
export function buildParams(filters: Readonly<Record<string, WireInput>>): QueryParam[] {
  const params: QueryParam[] = [];
  for (const [name, raw] of Object.entries(filters)) {
    const value = toWireValue(raw);
    if (value === undefined) {
      continue;
    }

    for (const item of Array.isArray(value) ? value : [value]) {
      params.push([name, toParamString(item)]);
    }
  }

  return params;
}

/**
 * Serializes a request body, dropping absent values and keeping JSON types
 * (booleans stay booleans, lists stay lists). Entries of `json` are free-form
 * values such as contact fields or flow params; they are copied as they are.
 */
export function buildPayload(
  fields: Readonly<Record<string, WireInput>>,
  json: Readonly<Record<string, JsonValue | undefined>> = {},
): JsonObject {
  const payload: JsonObject = {};
  for (const [name, raw] of Object.entries(fields)) {
    const value = toWireValue(raw);
    if (value !== undefined) {
      payload[name] = value;
    }
  }

  for (const [name, value] of Object.entries(json)) {
    if (value !== undefined) {
      payload[name] = value;
    }
  }

  return payload;
}

/**
 * Immutable description of one filtered request against a resource.
 * Advancing through pages produces a new query via {@link Query.withNext}.
 */
export class Query {
  /** Resource path relative to the API root, without `.json` (e.g. `contacts`) */
  readonly path: string;
  /** Serialized filters, in insertion order */
  readonly params: readonly QueryParam[];
  /** Absolute continuation URL from the previous page, if any */
  readonly next: string | null;

  constructor(path: string, params: readonly QueryParam[] = [], next: string | null = null) {
    this.path = path;
    this.params = Object.freeze(params.map((param) => Object.freeze([param[0], param[1]] as const)));
    this.next = next;
    Object.freeze(this);
  }

  /** Builds a query from unserialized filters. */
  static of(path: string, filters: Readonly<Record<string, WireInput>> = {}): Query {
    return new Query(path, buildParams(filters));
  }

  /** Same resource and filters, continuing from `next`. */
  withNext(next: string | null): Query {
    return new Query(this.path, this.params, next);
  }

  /** Query string for the filters, without the leading `?` */
  get search(): string {
    return new URLSearchParams(this.params.map(([name, value]): [string, string] => [name, value])).toString();
  }

  /**
   * Where the request goes: the continuation URL when set, else `<path>.json?<filters>`
   * relative to the API root.
   */
  get url(): string {
    if (this.next) {
      return this.next;
    }

    const search = this.search;
    return search ? `${this.path}.json?${search}` : `${this.path}.json`;
  }
}
