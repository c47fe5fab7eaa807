/** Constructor of an error class, whatever its constructor arguments. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * With `shallow` only the outermost error is inspected. Cyclic cause chains end the search.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    if (shallow) {
      return null;
    }

    current = current.cause;
  }

  return null;
}
