import { safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON.
 *
 * If parsing succeeds, returns the parsed value; otherwise returns the original input unchanged.
 * This function never throws.
 */
export function tryParse(input: string): unknown {
  const [errParsed, parsed] = safeWrap<unknown>(() => JSON.parse(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}

/**
 * Narrows an unknown value to a plain JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
