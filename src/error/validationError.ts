import type { StandardSchemaV1 } from '@standard-schema/spec';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a validation error when validating with @standard-schema,
 * e.g. an out-of-range timeout or a malformed base URL.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema validation issues */
  issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const details = issues.map((issue) => issue.message).join('; ');
    super(details ? `${message}: ${details}` : message, opts);

    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return getValidationError(error) !== null;
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
