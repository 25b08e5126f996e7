import { z } from 'zod';
import { AuthenticationError } from './authenticationError.js';
import { NotFoundError } from './notFoundError.js';
import { ProtocolError } from './protocolError.js';
import { RateLimitError } from './rateLimitError.js';
import type { ApiError } from './types.js';
import { type FieldErrors, NON_FIELD_ERRORS, ValidationError } from './validationError.js';

/** Wait applied when a 429 carries no usable Retry-After header. */
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

/** Anything headers can be looked up on, `Headers` included. */
export type HeaderLookup = { get(name: string): string | null };

/** IMF-fixdate, the only HTTP-date form servers are allowed to send. */
const HTTP_DATE = /^[A-Z][a-z]{2}, \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} GMT$/;

const fieldMessagesSchema = z.union([z.string(), z.array(z.string())]);
const validationBodySchema = z.union([z.record(z.string(), fieldMessagesSchema), z.array(z.string())]);

/**
 * Parses a Retry-After header value, given either as delay-seconds or as an HTTP-date.
 * Falls back to {@link DEFAULT_RETRY_AFTER_SECONDS} when absent or unreadable.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number {
  const trimmed = value?.trim();
  if (!trimmed) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }

  if (!HTTP_DATE.test(trimmed)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  return Math.max(0, Math.ceil((at - now) / 1000));
}

/**
 * Reads the per-field messages out of a 400 body. Returns null when the body
 * isn't JSON in one of the shapes the server uses for validation failures.
 */
export function parseFieldErrors(rawBody: string | null): FieldErrors | null {
  if (!rawBody) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    return null;
  }

  const parsed = validationBodySchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  if (Array.isArray(parsed.data)) {
    return parsed.data.length ? { [NON_FIELD_ERRORS]: parsed.data } : null;
  }

  const entries = Object.entries(parsed.data);
  if (!entries.length) {
    return null;
  }

  const errors: Record<string, readonly string[]> = {};
  for (const [field, messages] of entries) {
    errors[field] = typeof messages === 'string' ? [messages] : messages;
  }

  return errors;
}

/**
 * Maps a non-2xx response onto the error taxonomy.
 *
 * - 401/403: {@link AuthenticationError}
 * - 400 with a readable body: {@link ValidationError}
 * - 404: {@link NotFoundError}
 * - 429: {@link RateLimitError}
 * - anything else: {@link ProtocolError}
 */
export function classify(status: number, rawBody: string | null, headers: HeaderLookup): ApiError {
  if (status === 401 || status === 403) {
    return new AuthenticationError(status);
  }

  if (status === 400) {
    const errors = parseFieldErrors(rawBody);
    if (errors) {
      return new ValidationError(errors);
    }

    return new ProtocolError(`error reading validation failure, unexpected body for status ${status}`, status, rawBody);
  }

  if (status === 404) {
    return new NotFoundError();
  }

  if (status === 429) {
    return new RateLimitError(parseRetryAfter(headers.get('retry-after')));
  }

  return new ProtocolError(`Request failed with status ${status}`, status, rawBody);
}
