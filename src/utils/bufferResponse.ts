import { Response } from 'undici';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Statuses a `Response` may not be constructed with a body for. */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * Reads the whole body of `response` and returns an in-memory copy with the same
 * status, status text and headers.
 *
 * Reading happens under whatever signal the request was sent with, so an abort or
 * timeout while the body streams surfaces here as an error.
 */
export async function bufferResponse(response: Response): SafeWrapAsync<Error, Response> {
  const [errBody, body] = await safeWrapAsync(() => response.arrayBuffer());
  if (errBody) {
    return [new Error('error reading response body in bufferResponse', { cause: errBody }), null];
  }

  const [errCopy, copy] = safeWrap(
    () =>
      new Response(NULL_BODY_STATUSES.has(response.status) ? null : body, {
        status: response.status,
        statusText: response.statusText,
        headers: response.headers,
      }),
  );
  if (errCopy) {
    return [new Error('error copying response in bufferResponse', { cause: errCopy }), null];
  }

  return [null, copy];
}
