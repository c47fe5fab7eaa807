import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the exchange itself fails: connection or I/O failure,
 * timeout, abort, or a transport that was already closed.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  name = 'TransportError';
  /** HTTP method of the failed exchange */
  #method: string;
  /** URL of the failed exchange */
  #url: string;

  /** Creates a new instance of a TransportError for the given method + url */
  constructor(message: string, method: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#method = method;
    this.#url = url;
  }

  /** HTTP method of the failed exchange */
  get method(): string {
    return this.#method;
  }

  /** URL of the failed exchange */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
