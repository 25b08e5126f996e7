import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into `[name, value]` pairs.
 */
function toEntries(headers?: HeaderOptions): Array<[string, string | null]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * A `null` value drops a header set by an earlier source.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (value === null) {
      merged.delete(key);
      continue;
    }

    merged.set(key, value);
  }

  return merged;
}

/**
 * Headers every API call carries: token auth, JSON in both directions and a
 * User-Agent naming the caller's application ahead of this library.
 */
export function apiHeaders(token: string, userAgent: string): Record<string, string> {
  return {
    Authorization: `Token ${token}`,
    Accept: 'application/json',
    'Content-Type': 'application/json',
    'User-Agent': userAgent,
  };
}
