/**
 * listwise/pair
 *
 * Immutable two-element tuple produced by `zip` and `entriesOf`.
 */

/**
 * A frozen `[first, second]` tuple. Two pairs with equal components are
 * interchangeable; compare them structurally, not by reference.
 */
export type Pair<A, B> = readonly [first: A, second: B];

/**
 * Create a frozen pair.
 */
export function pair<A, B>(first: A, second: B): Pair<A, B> {
  return Object.freeze([first, second] as const);
}

export const first = <A, B>(p: Pair<A, B>): A => p[0];

export const second = <A, B>(p: Pair<A, B>): B => p[1];

/**
 * Exchange the components of a pair.
 */
export const swap = <A, B>(p: Pair<A, B>): Pair<B, A> => pair(p[1], p[0]);

/**
 * Render a pair as `(first, second)`.
 *
 * @example
 * ```typescript
 * formatPair(pair(1, "one")); // "(1, one)"
 * ```
 */
export function formatPair<A, B>(p: Pair<A, B>): string {
  return `(${String(p[0])}, ${String(p[1])})`;
}
