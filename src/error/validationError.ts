import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a value fails its Standard Schema, e.g. a json response
 * that does not match the schema of its response type.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  #issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, the issues are appended to the message */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(`${message}; issues: ${JSON.stringify(issues)}`, opts);
    this.#issues = issues;
  }

  /** Issues reported by the schema, empty when the schema itself failed */
  get issues(): readonly StandardSchemaV1.Issue[] {
    return this.#issues;
  }
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}
