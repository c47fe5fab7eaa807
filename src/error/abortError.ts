import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an exchange is aborted, e.g. because its transport was closed.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
