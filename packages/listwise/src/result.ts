/**
 * listwise/result
 *
 * Minimal Result primitives used by the non-throwing `try*` variants.
 *
 * @example
 * ```typescript
 * import { tryChunked } from 'listwise';
 * import { matchResult } from 'listwise/result';
 *
 * const text = matchResult(tryChunked(rows, pageSize), {
 *   ok: (pages) => `${pages.length} pages`,
 *   err: (error) => error.message,
 * });
 * ```
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { readonly ok: true; readonly value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E> = { readonly ok: false; readonly error: E };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown> = Ok<T> | Err<E>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 */
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => !r.ok;

// =============================================================================
// Transformers
// =============================================================================

/**
 * Extracts the value from an Ok result, or returns a default value if it's an Err.
 */
export const unwrapOr = <T, E>(r: Result<T, E>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;

/**
 * Extracts the value from an Ok result, or throws the error of an Err.
 */
export const unwrap = <T, E>(r: Result<T, E>): T => {
  if (r.ok) return r.value;
  throw r.error;
};

/**
 * Transforms the value of an Ok result; Err passes through untouched.
 */
export const mapResult = <T, U, E>(r: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  r.ok ? ok(fn(r.value)) : r;

/**
 * Folds a Result into a single value.
 */
export const matchResult = <T, E, R>(
  r: Result<T, E>,
  handlers: { ok: (value: T) => R; err: (error: E) => R }
): R => (r.ok ? handlers.ok(r.value) : handlers.err(r.error));
