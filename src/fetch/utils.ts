import { Headers } from 'undici';
import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * Later values win; a `null`/`undefined` value removes the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value === null || value === undefined) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}
