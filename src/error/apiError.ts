import type { Response } from 'undici';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Extra context attached to an {@link ApiError} when an HTTP exchange completed. */
export interface ApiErrorOptions extends ErrorOptions {
  /** HTTP status of the completed exchange. */
  statusCode?: number;
  /** Raw response, kept for diagnostics. */
  response?: Response;
}

/**
 * The single error type surfaced by `ApiClient`.
 *
 * `statusCode` and `response` are only set when a response was actually received;
 * transport failures and rejected request bodies carry neither.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  name = 'ApiError';
  /** Internal status code of the failed exchange */
  #statusCode: number | null;
  /** Internal raw response of the failed exchange */
  #response: Response | null;

  /** Creates a new instance of an ApiError, optionally carrying the failed exchange */
  constructor(message: string, { statusCode, response, ...opts }: ApiErrorOptions = {}) {
    super(message, opts);
    this.#statusCode = statusCode ?? null;
    this.#response = response ?? null;
  }

  /** HTTP status code, or `null` when no response was received */
  get statusCode(): number | null {
    return this.#statusCode;
  }

  /** Raw response, or `null` when no response was received */
  get response(): Response | null {
    return this.#response;
  }
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return getApiError(error) !== null;
}
