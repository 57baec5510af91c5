/**
 * Helpers over key-value mappings.
 *
 * Inputs are read through `ReadonlyMap`; results are new `Map`s, except
 * `getOrPut`, which inserts into the map it is given.
 */

import { type Pair, pair } from "./pair";

/**
 * Return `map.get(key)`, inserting `compute(key)` first when the key is
 * absent. `compute` runs at most once per key, and a present key is never
 * overwritten, even when its value is `undefined`.
 *
 * @example
 * ```typescript
 * const byLength = new Map<number, string[]>();
 * getOrPut(byLength, word.length, () => []).push(word);
 * ```
 */
export function getOrPut<K, V>(map: Map<K, V>, key: K, compute: (key: K) => V): V {
  const existing = map.get(key);
  if (isPresent(map, key, existing)) return existing;
  const value = compute(key);
  map.set(key, value);
  return value;
}

// `get` reads a stored `undefined` and a missing key alike; `has` tells them apart.
function isPresent<K, V>(map: ReadonlyMap<K, V>, key: K, value: V | undefined): value is V {
  return value !== undefined || map.has(key);
}

/**
 * The entries of `map` as pairs, in the map's iteration order.
 */
export function entriesOf<K, V>(map: ReadonlyMap<K, V>): Pair<K, V>[] {
  const result: Pair<K, V>[] = [];
  for (const [key, value] of map) result.push(pair(key, value));
  return result;
}

/**
 * Accumulate over the entries of `map` in iteration order.
 */
export function foldEntries<K, V, R>(
  map: ReadonlyMap<K, V>,
  initial: R,
  operation: (accumulator: R, key: K, value: V) => R
): R {
  let accumulator = initial;
  for (const [key, value] of map) {
    accumulator = operation(accumulator, key, value);
  }
  return accumulator;
}

/**
 * Build a new map by re-keying and re-valuing each entry. `transform`
 * returns the new key, the new value and whether to keep the entry. When
 * two entries land on the same key, the later one wins.
 *
 * @example
 * ```typescript
 * transformMap(prices, (sku, cents) => [sku.toUpperCase(), cents / 100, cents > 0]);
 * ```
 */
export function transformMap<K, V, K2 = K, V2 = V>(
  map: ReadonlyMap<K, V>,
  transform: (key: K, value: V) => readonly [key: K2, value: V2, keep: boolean]
): Map<K2, V2> {
  const result = new Map<K2, V2>();
  for (const [key, value] of map) {
    const [newKey, newValue, keep] = transform(key, value);
    if (keep) result.set(newKey, newValue);
  }
  return result;
}
