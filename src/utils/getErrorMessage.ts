import type { Response } from 'undici';
import { isJsonObject, tryParse } from './tryParse.js';
import { safeWrapAsync } from './wrap.js';

/** Body fields consulted for a human-readable message, in order of preference. */
const MESSAGE_FIELDS = ['message', 'error'] as const;

/**
 * Extracts a human-readable message from a failed response.
 *
 * The body is read from a clone, so `response` stays unread. A JSON object body
 * yields its `message` field, else its `error` field; anything else falls back to
 * `API request failed: <status> <reason>`.
 */
export async function getErrorMessage(response: Response): Promise<string> {
  const fallback = `API request failed: ${response.status} ${response.statusText}`.trimEnd();

  const [errText, text] = await safeWrapAsync(() => response.clone().text());
  if (errText || !text) {
    return fallback;
  }

  const body = tryParse(text);
  if (!isJsonObject(body)) {
    return fallback;
  }

  for (const field of MESSAGE_FIELDS) {
    const value = body[field];
    if (value === undefined || value === null) {
      continue;
    }

    return typeof value === 'string' ? value : JSON.stringify(value);
  }

  return fallback;
}
