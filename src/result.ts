/**
 * Result Type
 *
 * Explicit success/failure values for operations that can fail on bad input
 * (parsing, validation). Callers branch on `ok` instead of catching.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}
