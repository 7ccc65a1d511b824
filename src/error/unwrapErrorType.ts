/** Constructor of an error class, used as the lookup key when walking `cause` chains. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current = err;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

/**
 * Returns the message of the innermost error in a `cause` chain.
 * Non-error causes (strings, plain objects) are stringified.
 */
export function rootCauseMessage(err: unknown): string {
  const seen = new Set<unknown>();
  let current = err;
  while (current instanceof Error && current.cause !== undefined && !seen.has(current.cause)) {
    seen.add(current);
    current = current.cause;
  }

  if (current instanceof Error) {
    return current.message;
  }

  if (typeof current === 'string') {
    return current;
  }

  return current === undefined ? 'unknown error' : JSON.stringify(current);
}
