export class WrappedError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = new.target.name;
  }
}

/**
 * Narrows an unknown thrown value to a node system error with the given code,
 * e.g. ENOENT or ESRCH.
 */
export function hasErrorCode(
  error: unknown,
  code: string,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && error.code === code;
}
