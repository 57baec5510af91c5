/**
 * Transformation family: map, filter, fold and reduce over sequences.
 *
 * Every function makes one left-to-right pass and never mutates its input.
 * Indexed callbacks receive the element's index as their first argument.
 */

import { EmptyInputError } from "./errors";
import { type Result, ok, err } from "./result";

// =============================================================================
// Mapping
// =============================================================================

/**
 * Apply `transform` to every element.
 */
export function map<T, R>(seq: readonly T[], transform: (element: T) => R): R[] {
  const result = new Array<R>(seq.length);
  for (let i = 0; i < seq.length; i++) {
    result[i] = transform(seq[i]);
  }
  return result;
}

/**
 * Apply `transform` to every element together with its index.
 */
export function mapIndexed<T, R>(
  seq: readonly T[],
  transform: (index: number, element: T) => R
): R[] {
  const result = new Array<R>(seq.length);
  for (let i = 0; i < seq.length; i++) {
    result[i] = transform(i, seq[i]);
  }
  return result;
}

/**
 * Map and filter in a single pass. `transform` returns the mapped value and
 * whether to keep it.
 *
 * @example
 * ```typescript
 * filterMap(["1", "x", "3"], (s) => {
 *   const n = Number(s);
 *   return [n, !Number.isNaN(n)];
 * }); // [1, 3]
 * ```
 */
export function filterMap<T, R>(
  seq: readonly T[],
  transform: (element: T) => readonly [value: R, keep: boolean]
): R[] {
  const result: R[] = [];
  for (const element of seq) {
    const [value, keep] = transform(element);
    if (keep) result.push(value);
  }
  return result;
}

/**
 * Map every element to a sequence and concatenate the results.
 */
export function flatMap<T, R>(
  seq: readonly T[],
  transform: (element: T) => readonly R[]
): R[] {
  const result: R[] = [];
  for (const element of seq) {
    for (const item of transform(element)) result.push(item);
  }
  return result;
}

export function flatMapIndexed<T, R>(
  seq: readonly T[],
  transform: (index: number, element: T) => readonly R[]
): R[] {
  const result: R[] = [];
  for (let i = 0; i < seq.length; i++) {
    for (const item of transform(i, seq[i])) result.push(item);
  }
  return result;
}

// =============================================================================
// Filtering
// =============================================================================

/**
 * Keep the elements satisfying `predicate`, in order.
 */
export function filter<T>(seq: readonly T[], predicate: (element: T) => boolean): T[] {
  const result: T[] = [];
  for (const element of seq) {
    if (predicate(element)) result.push(element);
  }
  return result;
}

export function filterIndexed<T>(
  seq: readonly T[],
  predicate: (index: number, element: T) => boolean
): T[] {
  const result: T[] = [];
  for (let i = 0; i < seq.length; i++) {
    if (predicate(i, seq[i])) result.push(seq[i]);
  }
  return result;
}

// =============================================================================
// Folding
// =============================================================================

/**
 * Accumulate from `initial`, left to right. Returns `initial` for empty input.
 */
export function fold<T, R>(
  seq: readonly T[],
  initial: R,
  operation: (accumulator: R, element: T) => R
): R {
  let accumulator = initial;
  for (const element of seq) {
    accumulator = operation(accumulator, element);
  }
  return accumulator;
}

export function foldIndexed<T, R>(
  seq: readonly T[],
  initial: R,
  operation: (index: number, accumulator: R, element: T) => R
): R {
  let accumulator = initial;
  for (let i = 0; i < seq.length; i++) {
    accumulator = operation(i, accumulator, seq[i]);
  }
  return accumulator;
}

// =============================================================================
// Reducing
// =============================================================================

/**
 * Accumulate starting from the first element.
 *
 * A single-element sequence returns that element without calling `combine`.
 *
 * @throws {EmptyInputError} when `seq` is empty
 */
export function reduce<T>(seq: readonly T[], combine: (accumulator: T, element: T) => T): T {
  const result = tryReduce(seq, combine);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Like `reduce`; `combine` also receives the index of the element being
 * folded in, so the first call sees index 1.
 *
 * @throws {EmptyInputError} when `seq` is empty
 */
export function reduceIndexed<T>(
  seq: readonly T[],
  combine: (index: number, accumulator: T, element: T) => T
): T {
  const result = tryReduceIndexed(seq, combine);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Non-throwing `reduce`.
 */
export function tryReduce<T>(
  seq: readonly T[],
  combine: (accumulator: T, element: T) => T
): Result<T, EmptyInputError> {
  if (seq.length === 0) return err(new EmptyInputError({ operation: "reduce" }));

  let accumulator = seq[0];
  for (let i = 1; i < seq.length; i++) {
    accumulator = combine(accumulator, seq[i]);
  }
  return ok(accumulator);
}

/**
 * Non-throwing `reduceIndexed`.
 */
export function tryReduceIndexed<T>(
  seq: readonly T[],
  combine: (index: number, accumulator: T, element: T) => T
): Result<T, EmptyInputError> {
  if (seq.length === 0) return err(new EmptyInputError({ operation: "reduceIndexed" }));

  let accumulator = seq[0];
  for (let i = 1; i < seq.length; i++) {
    accumulator = combine(i, accumulator, seq[i]);
  }
  return ok(accumulator);
}
