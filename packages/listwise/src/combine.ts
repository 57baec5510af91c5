/**
 * Combination family: zip two sequences into pairs and back.
 */

import { type Pair, pair } from "./pair";

/**
 * Pair elements by index. The result is as long as the shorter input;
 * trailing elements of the longer one are dropped.
 *
 * @example
 * ```typescript
 * zip([1, 2, 3], ["a", "b"]); // [[1, "a"], [2, "b"]]
 * ```
 */
export function zip<A, B>(first: readonly A[], second: readonly B[]): Pair<A, B>[] {
  const length = Math.min(first.length, second.length);
  const result = new Array<Pair<A, B>>(length);
  for (let i = 0; i < length; i++) {
    result[i] = pair(first[i], second[i]);
  }
  return result;
}

/**
 * Split pairs into the sequence of first components and the sequence of
 * second components. `unzip(zip(a, b))` returns `a` and `b` truncated to
 * the shorter length.
 */
export function unzip<A, B>(pairs: readonly Pair<A, B>[]): [first: A[], second: B[]] {
  const firsts = new Array<A>(pairs.length);
  const seconds = new Array<B>(pairs.length);
  for (let i = 0; i < pairs.length; i++) {
    [firsts[i], seconds[i]] = pairs[i];
  }
  return [firsts, seconds];
}
