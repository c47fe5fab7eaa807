import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an exchange exceeds the timeout configured on its transport.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a TimeoutError for the elapsed timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
