/**
 * Generic Result type for expected failures.
 * Throw only for programmer errors; return Result for operational errors.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs `fn` and captures errors accepted by `guard` as a failure result.
 *
 * Used at layer boundaries where a programmer error raised deep inside the
 * library (e.g. an ArgumentError) becomes an operational error for the
 * caller. Errors the guard rejects are rethrown unchanged.
 */
export function attempt<T, C, E>(
  fn: () => T,
  guard: (cause: unknown) => cause is C,
  toError: (cause: C) => E,
): Result<T, E> {
  try {
    return ok(fn());
  } catch (cause: unknown) {
    if (guard(cause)) {
      return err(toError(cause));
    }
    throw cause;
  }
}
