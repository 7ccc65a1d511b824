/**
 * Error entrypoint: exports the error taxonomy and helpers for identifying and unwrapping error types.
 * @module
 */

/** Error thrown into in-flight requests when the client is closed, and its type guard. */
export { AbortError, isAbortError } from './abortError.js';
/** The single error type surfaced by the API client. */
export { ApiError, type ApiErrorOptions, getApiError, isApiError } from './apiError.js';
/** Configuration file and configuration check failures. */
export { ConfigurationError, InvalidFormatError, NotFoundError, SaveError } from './configError.js';
/** Error representing a non-2xx HTTP response at the transport level. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a request exceeds its timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class, or the innermost message. */
export { type ErrorClass, rootCauseMessage, unwrapErrorType } from './unwrapErrorType.js';
/** Error raised when configuration fields or client props fail validation. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
