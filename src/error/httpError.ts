import type { Response } from 'undici';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code, as reported by the transport.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(response: Response, message = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /**
   * Response causing the HTTPError. The body has not been read.
   */
  get response(): Response {
    return this.#response;
  }
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return getHttpError(error) !== null;
}
