import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)`, which must settle synchronously. Schemas with
 *   async refinements return a Promise and are rejected with `"error validating data synchronously"`.
 * - A throwing schema is returned as a `ValidationError` with the thrown value as cause.
 * - If the validation result contains `issues`, a `ValidationError` with the given `message`
 *   (default `"error validating data"`) and the collected issues is returned.
 * - On successful validation without issues, returns `[null, result.value]`.
 *
 * @example
 * const [err, props] = validator(input, clientPropsSchema, 'invalid client options');
 */
export function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrap<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  if (result instanceof Promise) {
    // Settle the pending result so a rejection is never left unhandled
    result.catch(() => undefined);
    return [new ValidationError('error validating data synchronously', []), null];
  }

  if ('issues' in result && result.issues) {
    return [new ValidationError(message, result.issues), null];
  }

  return [null, result.value];
}
