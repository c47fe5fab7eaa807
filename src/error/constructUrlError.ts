import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request URL cannot be built, e.g. no base URL is available
 * or the request never had one (completed requests).
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  name = 'ConstructURLError';
  /** Endpoint the URL was being built from */
  #endpoint: string;

  /** Creates a new instance of a ConstructURLError with the endpoint it failed on */
  constructor(message: string, endpoint: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#endpoint = endpoint;
  }

  /** Endpoint the URL was being built from */
  get endpoint(): string {
    return this.#endpoint;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
