import type { QueryParams } from '../types/request.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Resolves `path` against `baseUrl` and appends query parameters.
 *
 * Resolution follows the WHATWG URL rules: a relative path is resolved against the
 * base (replacing its last segment unless the base ends with `/`), while a path
 * starting with `/` replaces the base path entirely. `null` and `undefined` query
 * values are skipped and array values are appended once per element.
 *
 * @example
 * constructUrl('https://api.example.com/', 'users', { page: 2, tag: ['a', 'b'] });
 * // [null, URL('https://api.example.com/users?page=2&tag=a&tag=b')]
 */
export function constructUrl(baseUrl: string, path: string, query?: QueryParams): SafeWrap<Error, URL> {
  const [err, url] = safeWrap(() => new URL(path, baseUrl));
  if (err) {
    return [new Error(`error constructing URL from ${baseUrl} and ${path}`, { cause: err }), null];
  }

  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      url.searchParams.append(key, String(item));
    }
  }

  return [null, url];
}
