/**
 * Result Type
 *
 * Fallible constructors and parsers return a Result instead of throwing.
 * Callers branch on `ok` and read `value` or `error`.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Returns the value of a successful Result, or throws its error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  throw result.error
}
