/** Any error class, whatever its constructor takes. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Matches by `instanceof`, or by `name` for errors created by another copy of this package.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown, shallow = false): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass || matchesByName(errorClass, current)) {
      return current;
    }

    if (shallow) {
      return null;
    }

    current = current.cause;
  }

  return null;
}

function matchesByName<T extends Error>(errorClass: ErrorClass<T>, err: Error): err is T {
  return err.name !== 'Error' && err.name === errorClass.name;
}
