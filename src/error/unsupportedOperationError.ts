import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a serializer is asked to do something it cannot,
 * e.g. serializing a structured value with the byte serializer.
 */
export class UnsupportedOperationError extends Error {
  /** UnsupportedOperationError error-name */
  name = 'UnsupportedOperationError';
}

/**
 * Extract an {@link UnsupportedOperationError} from an unknown error value, following nested causes.
 */
export function getUnsupportedOperationError(error: unknown): null | UnsupportedOperationError {
  return unwrapErrorType(UnsupportedOperationError, error);
}

/**
 * Type guard for {@link UnsupportedOperationError}.
 */
export function isUnsupportedOperationError(error: unknown): error is UnsupportedOperationError {
  return isErrorType(UnsupportedOperationError, error);
}
