import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Lifecycle hooks a client exposes around every exchange. */
export type HookName = 'onRequest' | 'onResponse' | 'onException';

/**
 * Error raised when a client lifecycle hook throws. The thrown value is the `cause`.
 */
export class HookError extends Error {
  /** HookError error-name */
  name = 'HookError';
  /** Hook that threw */
  #hook: HookName;

  /** Creates a new instance of a HookError for the hook that threw */
  constructor(message: string, hook: HookName, opts?: ErrorOptions) {
    super(message, opts);
    this.#hook = hook;
  }

  /** Hook that threw */
  get hook(): HookName {
    return this.#hook;
  }
}

/**
 * Extract a {@link HookError} from an unknown error value, following nested causes.
 */
export function getHookError(error: unknown): null | HookError {
  return unwrapErrorType(HookError, error);
}

/**
 * Type guard for {@link HookError}.
 */
export function isHookError(error: unknown): error is HookError {
  return isErrorType(HookError, error);
}
