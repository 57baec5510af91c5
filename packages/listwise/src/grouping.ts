/**
 * Partition/distinct family: predicates over whole sequences, splitting,
 * de-duplication and grouping.
 *
 * Key equality everywhere is SameValueZero, the equality `Map` and `Set`
 * use: primitives compare by value, objects by reference. Use `distinctBy`
 * or `groupBy` with a primitive key to compare objects structurally.
 */

// =============================================================================
// Quantifiers
// =============================================================================

/**
 * True when every element satisfies `predicate`; true for empty input.
 * Stops at the first failing element.
 */
export function all<T>(seq: readonly T[], predicate: (element: T) => boolean): boolean {
  for (const element of seq) {
    if (!predicate(element)) return false;
  }
  return true;
}

/**
 * True when at least one element satisfies `predicate`; false for empty input.
 * Stops at the first matching element.
 */
export function any<T>(seq: readonly T[], predicate: (element: T) => boolean): boolean {
  for (const element of seq) {
    if (predicate(element)) return true;
  }
  return false;
}

// =============================================================================
// Partitioning
// =============================================================================

/**
 * Split into `[matching, nonMatching]`, preserving relative order in each.
 */
export function partition<T>(
  seq: readonly T[],
  predicate: (element: T) => boolean
): [matching: T[], nonMatching: T[]] {
  const matching: T[] = [];
  const nonMatching: T[] = [];
  for (const element of seq) {
    (predicate(element) ? matching : nonMatching).push(element);
  }
  return [matching, nonMatching];
}

// =============================================================================
// De-duplication
// =============================================================================

/**
 * Drop repeated elements, keeping first occurrences in order.
 */
export function distinct<T>(seq: readonly T[]): T[] {
  return distinctBy(seq, (element) => element);
}

/**
 * Drop elements whose key was already seen; the first element per key wins.
 */
export function distinctBy<T, K>(seq: readonly T[], keySelector: (element: T) => K): T[] {
  const seen = new Set<K>();
  const result: T[] = [];
  for (const element of seq) {
    const key = keySelector(element);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(element);
  }
  return result;
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Group values by key. `transform` maps each element to a `[key, value]`
 * pair; each group lists its values in input order. Only keys that occur
 * appear in the result.
 *
 * @example
 * ```typescript
 * groupBy(["apple", "apricot", "banana"], (s) => [s[0], s.length]);
 * // Map { "a" => [5, 7], "b" => [6] }
 * ```
 */
export function groupBy<T, K, V>(
  seq: readonly T[],
  transform: (element: T) => readonly [key: K, value: V]
): Map<K, V[]> {
  const groups = new Map<K, V[]>();
  for (const element of seq) {
    const [key, value] = transform(element);
    let group = groups.get(key);
    if (group === undefined) {
      group = [];
      groups.set(key, group);
    }
    group.push(value);
  }
  return groups;
}
