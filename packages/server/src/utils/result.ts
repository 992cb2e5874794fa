/**
 * @fileoverview Result type for operations that can fail without throwing.
 */

/**
 * Discriminated union that's either { ok: true, value: T } or { ok: false, error: E }
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Create a successful result containing a value.
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Create a failed result containing an error.
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
