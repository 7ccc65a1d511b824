import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Internal timeout that elapsed, in milliseconds */
  #timeoutMs: number;

  /** Creates a new instance of a TimeoutError for the elapsed timeout */
  constructor(timeoutMs: number, opts?: ErrorOptions) {
    super(`request timed out after ${timeoutMs}ms`, opts);
    this.#timeoutMs = timeoutMs;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeoutMs(): number {
    return this.#timeoutMs;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
