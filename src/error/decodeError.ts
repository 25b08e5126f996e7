import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** One step into a payload: an object key or a list index. */
export type PathSegment = string | number;

/** Renders a path as `contact.uuid` / `groups[1].name`. */
export function formatPath(path: readonly PathSegment[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
      continue;
    }

    out += out ? `.${segment}` : segment;
  }

  return out;
}

function describeValue(value: unknown): string {
  if (value === undefined) {
    return 'nothing';
  }

  const json = JSON.stringify(value);
  return json.length > 80 ? `${json.slice(0, 77)}...` : json;
}

/**
 * Error raised when a raw payload can't be materialized into a typed object.
 * Names the offending field (as a path from the outermost model) and the raw value found there.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  override name = 'DecodeError';
  /** Discriminant shared with the API error kinds */
  readonly kind = 'DecodeError';
  /** Why the value was rejected, without location */
  readonly reason: string;
  /** Raw value that failed to decode */
  readonly value: unknown;
  /** Model the failing field belongs to, when known */
  readonly model: string | null;
  /** Location of the failing value */
  readonly path: readonly PathSegment[];

  constructor(
    reason: string,
    value: unknown,
    location: { model?: string | null; path?: readonly PathSegment[] } = {},
    opts?: ErrorOptions,
  ) {
    const path = location.path ?? [];
    const model = location.model ?? null;
    const where = path.length ? ` field '${formatPath(path)}'` : '';
    super(`error decoding ${model ?? 'value'}${where}: ${reason}, got ${describeValue(value)}`, opts);
    this.reason = reason;
    this.value = value;
    this.model = model;
    this.path = path;
  }

  /** Dotted path of the failing field, empty when the value itself failed */
  get field(): string {
    return formatPath(this.path);
  }

  /** Re-anchors this error one level further out, e.g. under the model field that held it. */
  at(segment: PathSegment, model?: string): DecodeError {
    return new DecodeError(
      this.reason,
      this.value,
      { model: model ?? this.model, path: [segment, ...this.path] },
      { cause: this.cause },
    );
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}
