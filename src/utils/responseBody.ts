import type { JsonValue } from '../types/json.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the response body as text. Statuses that carry no body (204, 205) and
 * empty bodies yield `null`.
 */
export async function readResponseText(response: Response): SafeWrapAsync<Error, string | null> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in readResponseText', { cause: errText }), null];
  }

  return [null, text || null];
}

/**
 * Parses a response body read with {@link readResponseText}.
 */
export function parseJson(text: string): SafeWrap<Error, JsonValue> {
  const [errJson, json] = safeWrap((): JsonValue => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in parseJson', { cause: errJson }), null];
  }

  return [null, json];
}
