import { setImmediate } from 'node:timers/promises';

/**
 * Yields to the event loop, resuming after pending I/O callbacks have run.
 *
 * Transports await this before an exchange so that no part of it runs on the caller's stack.
 *
 * @example
 * await defer();
 */
export function defer(): Promise<void> {
  return setImmediate();
}
