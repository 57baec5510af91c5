/**
 * listwise/memo
 *
 * Get-or-compute tables for memoizing expensive values by key.
 *
 * @example
 * ```typescript
 * import { createMemoTable, memoize } from 'listwise/memo';
 *
 * // Compute each key once
 * const table = createMemoTable<string, Report>();
 * const report = table.getOrPut(month, () => buildReport(month));
 *
 * // Memoize a one-argument function
 * const parse = memoize((source: string) => expensiveParse(source));
 * ```
 */

export {
  // Types
  type MemoTable,
  type MemoTableEvent,
  type MemoTableOptions,
  type MemoTableStats,
  type MemoizeOptions,
  type MemoizedFunction,

  // Functions
  createMemoTable,
  memoize,
} from "./memo-table";
