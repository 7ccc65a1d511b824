import type { Response } from 'undici';
import type { JsonValue } from '../types/json.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Safely extracts and parses a successful response body into a tuple-style result.
 *
 * - 204 and 205 responses carry no body and resolve to `null`.
 * - An empty body resolves to `null`.
 * - Any other body is parsed as JSON whatever its content type; a parse failure is returned as an error.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, JsonValue> {
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  // Read as text once, parsing after; the body cannot be consumed twice
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const [errJson, json] = safeWrap<JsonValue>(() => JSON.parse(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
