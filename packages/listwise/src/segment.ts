/**
 * Segmentation family: fixed-size chunks, predicate-driven runs and
 * sliding windows.
 *
 * Every segment is a fresh array; none alias the input.
 */

import { type InvalidArgumentError, checkPositiveInteger } from "./errors";
import { type Result, ok, err } from "./result";

// =============================================================================
// chunked() - Fixed-size runs
// =============================================================================

/**
 * Split into consecutive runs of `size`; the last run holds the remainder.
 *
 * @example
 * ```typescript
 * chunked([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 * ```
 *
 * @throws {InvalidArgumentError} when `size` is not a positive integer
 */
export function chunked<T>(seq: readonly T[], size: number): T[][] {
  const result = tryChunked(seq, size);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Non-throwing `chunked`.
 */
export function tryChunked<T>(
  seq: readonly T[],
  size: number
): Result<T[][], InvalidArgumentError> {
  const invalid = checkPositiveInteger("chunked", "size", size);
  if (invalid) return err(invalid);

  const chunks = new Array<T[]>(Math.ceil(seq.length / size));
  for (let start = 0, i = 0; start < seq.length; start += size, i++) {
    chunks[i] = seq.slice(start, start + size);
  }
  return ok(chunks);
}

// =============================================================================
// chunkedBy() - Predicate-driven runs
// =============================================================================

/**
 * Split into runs by comparing neighbours. `shouldJoin` receives the last
 * element of the current run and the next element; `false` closes the run
 * and starts a new one with the next element.
 *
 * This groups equal neighbours only when `shouldJoin` says so; it is not a
 * group-by.
 *
 * @example
 * ```typescript
 * chunkedBy([1, 2, 3, 2, 3, 4], (prev, next) => next === prev + 1);
 * // [[1, 2, 3], [2, 3, 4]]
 * ```
 */
export function chunkedBy<T>(
  seq: readonly T[],
  shouldJoin: (last: T, next: T) => boolean
): T[][] {
  const runs: T[][] = [];
  if (seq.length === 0) return runs;

  let current: T[] = [seq[0]];
  let last = seq[0];
  for (let i = 1; i < seq.length; i++) {
    const next = seq[i];
    if (shouldJoin(last, next)) {
      current.push(next);
    } else {
      runs.push(current);
      current = [next];
    }
    last = next;
  }
  runs.push(current);
  return runs;
}

// =============================================================================
// windowed() - Sliding windows
// =============================================================================

/**
 * Sliding windows of at most `size` elements, starting every `step`
 * elements. Windows near the end hold whatever is left, so they may be
 * shorter than `size`; a window is emitted for every start index below the
 * sequence length.
 *
 * @example
 * ```typescript
 * windowed([1, 2, 3, 4, 5], 3, 2); // [[1, 2, 3], [3, 4, 5], [5]]
 * ```
 *
 * @throws {InvalidArgumentError} when `size` or `step` is not a positive integer
 */
export function windowed<T>(seq: readonly T[], size: number, step = 1): T[][] {
  const result = tryWindowed(seq, size, step);
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * Non-throwing `windowed`.
 */
export function tryWindowed<T>(
  seq: readonly T[],
  size: number,
  step = 1
): Result<T[][], InvalidArgumentError> {
  const invalid =
    checkPositiveInteger("windowed", "size", size) ??
    checkPositiveInteger("windowed", "step", step);
  if (invalid) return err(invalid);

  const length = seq.length;
  const windows = new Array<T[]>(Math.ceil(length / step));
  let start = 0;
  let count = 0;
  while (start < length) {
    windows[count++] = seq.slice(start, Math.min(start + size, length));
    start = Math.min(start + step, length);
  }
  return ok(windows);
}
