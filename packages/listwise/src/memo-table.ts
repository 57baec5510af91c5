/**
 * listwise/memo
 *
 * Get-or-compute tables for memoizing expensive values by key.
 *
 * @example
 * ```typescript
 * import { createMemoTable, memoize } from 'listwise/memo';
 *
 * const layouts = createMemoTable<string, Layout>();
 * const layout = layouts.getOrPut(pageId, () => computeLayout(pageId));
 *
 * const slowSquare = (n: number) => n * n;
 * const square = memoize(slowSquare);
 * square(4); // computed
 * square(4); // served from the table
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Events emitted to `onEvent`.
 *
 * - `memo_hit`: the key was present, compute was skipped
 * - `memo_miss`: the key was absent, compute is about to run
 * - `memo_stored`: compute returned and its value was stored
 */
export type MemoTableEvent<K> =
  | { type: "memo_hit"; key: K; ts: number }
  | { type: "memo_miss"; key: K; ts: number }
  | { type: "memo_stored"; key: K; ts: number; durationMs: number };

/**
 * Table statistics.
 */
export interface MemoTableStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * MemoTable options.
 */
export interface MemoTableOptions<K, V> {
  /**
   * Initial contents. Seeded keys count as already computed.
   */
  entries?: Iterable<readonly [K, V]>;

  /**
   * Observer for hits, misses and stores. Called synchronously.
   */
  onEvent?: (event: MemoTableEvent<K>) => void;
}

/**
 * Key-value table with insert-if-absent semantics.
 *
 * Entries are only ever added through `getOrPut`; nothing removes or
 * replaces them. Not safe to share across concurrently running tasks that
 * may interleave inside `compute`.
 */
export interface MemoTable<K, V> extends Iterable<[K, V]> {
  /**
   * Return the value stored under `key`, computing and storing it first if
   * absent. `compute` runs at most once per key over the table's lifetime;
   * if it throws, the error propagates and the key stays absent.
   */
  getOrPut(key: K, compute: () => V): V;
  /** Stored value, or undefined when the key was never computed */
  get(key: K): V | undefined;
  /** Check if a key has been computed */
  has(key: K): boolean;
  /** Number of stored entries */
  readonly size: number;
  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<[K, V]>;
  /** Get table statistics */
  getStats(): MemoTableStats;
}

// =============================================================================
// createMemoTable()
// =============================================================================

/**
 * Create an empty (or seeded) MemoTable.
 *
 * @example
 * ```typescript
 * const events: MemoTableEvent<string>[] = [];
 * const table = createMemoTable<string, number>({
 *   entries: [["answer", 42]],
 *   onEvent: (e) => events.push(e),
 * });
 *
 * table.getOrPut("answer", () => 0); // 42, compute skipped
 * table.getOrPut("zero", () => 0); // 0, computed once
 * ```
 */
export function createMemoTable<K, V>(options: MemoTableOptions<K, V> = {}): MemoTable<K, V> {
  const { onEvent } = options;

  // Values are boxed so that a stored `undefined` is still a hit.
  interface Entry {
    value: V;
  }

  const store = new Map<K, Entry>();
  let hits = 0;
  let misses = 0;

  for (const [key, value] of options.entries ?? []) {
    if (!store.has(key)) store.set(key, { value });
  }

  return {
    getOrPut(key: K, compute: () => V): V {
      const entry = store.get(key);
      if (entry) {
        hits++;
        onEvent?.({ type: "memo_hit", key, ts: Date.now() });
        return entry.value;
      }

      misses++;
      const startedAt = Date.now();
      onEvent?.({ type: "memo_miss", key, ts: startedAt });

      const value = compute();
      // A re-entrant call may have stored the key already; that value stays.
      const stored = store.get(key);
      if (stored) return stored.value;
      store.set(key, { value });

      if (onEvent) {
        const ts = Date.now();
        onEvent({ type: "memo_stored", key, ts, durationMs: ts - startedAt });
      }
      return value;
    },

    get(key: K): V | undefined {
      return store.get(key)?.value;
    },

    has(key: K): boolean {
      return store.has(key);
    },

    get size(): number {
      return store.size;
    },

    *keys(): IterableIterator<K> {
      yield* store.keys();
    },

    *values(): IterableIterator<V> {
      for (const entry of store.values()) yield entry.value;
    },

    *entries(): IterableIterator<[K, V]> {
      for (const [key, entry] of store) yield [key, entry.value];
    },

    *[Symbol.iterator](): IterableIterator<[K, V]> {
      for (const [key, entry] of store) yield [key, entry.value];
    },

    getStats(): MemoTableStats {
      return { hits, misses, size: store.size };
    },
  };
}

// =============================================================================
// memoize() - One-argument function memoization
// =============================================================================

/**
 * memoize() options.
 */
export interface MemoizeOptions<A> {
  /**
   * Derives the table key from the argument.
   * Default: the argument itself (Map key equality).
   */
  keyFn?: (arg: A) => unknown;

  /**
   * Observer forwarded to the underlying table.
   */
  onEvent?: (event: MemoTableEvent<unknown>) => void;
}

/**
 * Memoized function interface.
 */
export interface MemoizedFunction<A, R> {
  (arg: A): R;
  /** Get statistics of the backing table */
  getStats(): MemoTableStats;
}

/**
 * Wrap a one-argument function so each distinct key is computed once.
 *
 * @example
 * ```typescript
 * const normalize = memoize(
 *   (user: { id: string; name: string }) => user.name.trim().toLowerCase(),
 *   { keyFn: (user) => user.id }
 * );
 * ```
 */
export function memoize<A, R>(
  fn: (arg: A) => R,
  options: MemoizeOptions<A> = {}
): MemoizedFunction<A, R> {
  const keyFn = options.keyFn ?? ((arg: A): unknown => arg);
  const table = createMemoTable<unknown, R>({ onEvent: options.onEvent });

  const memoized = (arg: A): R => table.getOrPut(keyFn(arg), () => fn(arg));

  memoized.getStats = () => table.getStats();

  return memoized;
}
