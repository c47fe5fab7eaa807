import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a compressed response body is malformed.
 */
export class DecompressionError extends Error {
  /** DecompressionError error-name */
  name = 'DecompressionError';
  /** Content coding that was being undone (`gzip` or `deflate`) */
  #encoding: string;

  /** Creates a new instance of a DecompressionError for the given content coding */
  constructor(message: string, encoding: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#encoding = encoding;
  }

  /** Content coding that was being undone */
  get encoding(): string {
    return this.#encoding;
  }
}

/**
 * Extract a {@link DecompressionError} from an unknown error value, following nested causes.
 */
export function getDecompressionError(error: unknown): null | DecompressionError {
  return unwrapErrorType(DecompressionError, error);
}

/**
 * Type guard for {@link DecompressionError}.
 */
export function isDecompressionError(error: unknown): error is DecompressionError {
  return isErrorType(DecompressionError, error);
}
