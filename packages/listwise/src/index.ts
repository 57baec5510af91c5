/**
 * listwise
 *
 * Typed helpers over arrays and maps: transformation, grouping,
 * segmentation and zipping, plus a get-or-compute memo table.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { chunked, groupBy, windowed, Listwise } from 'listwise';
 *
 * chunked([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 * windowed([1, 2, 3, 4], 2); // [[1, 2], [2, 3], [3, 4], [4]]
 * groupBy(words, (w) => [w[0], w]); // Map { "a" => [...], ... }
 *
 * Listwise.distinct([3, 1, 3]); // [3, 1]
 * ```
 *
 * ## Entry Points
 *
 * - `listwise` - everything below, plus the `Listwise` namespace
 * - `listwise/errors` - InvalidArgumentError, EmptyInputError and guards
 * - `listwise/result` - Result type used by the `try*` variants
 * - `listwise/memo` - createMemoTable, memoize
 * - `listwise/pair` - Pair tuple helpers
 */

import {
  map,
  mapIndexed,
  filter,
  filterIndexed,
  filterMap,
  flatMap,
  flatMapIndexed,
  fold,
  foldIndexed,
  reduce,
  reduceIndexed,
  tryReduce,
  tryReduceIndexed,
} from "./transform";
import { all, any, partition, distinct, distinctBy, groupBy } from "./grouping";
import { chunked, tryChunked, chunkedBy, windowed, tryWindowed } from "./segment";
import { zip, unzip } from "./combine";
import { takeWhile, dropWhile, takeLastWhile, dropLastWhile, reverse } from "./slicing";
import { getOrPut, entriesOf, foldEntries, transformMap } from "./maps";
import { pair, first, second, swap, formatPair } from "./pair";
import { createMemoTable, memoize } from "./memo-table";

// =============================================================================
// Listwise namespace (single import for every function)
// =============================================================================

const Listwise = {
  // Transformation
  map,
  mapIndexed,
  filter,
  filterIndexed,
  filterMap,
  flatMap,
  flatMapIndexed,
  fold,
  foldIndexed,
  reduce,
  reduceIndexed,
  tryReduce,
  tryReduceIndexed,
  // Partition / distinct
  all,
  any,
  partition,
  distinct,
  distinctBy,
  groupBy,
  // Segmentation
  chunked,
  tryChunked,
  chunkedBy,
  windowed,
  tryWindowed,
  // Combination
  zip,
  unzip,
  // Slicing
  takeWhile,
  dropWhile,
  takeLastWhile,
  dropLastWhile,
  reverse,
  // Maps
  getOrPut,
  entriesOf,
  foldEntries,
  transformMap,
  // Pair
  pair,
  first,
  second,
  swap,
  formatPair,
  // Memo
  createMemoTable,
  memoize,
} as const;

export { Listwise };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export {
  map,
  mapIndexed,
  filter,
  filterIndexed,
  filterMap,
  flatMap,
  flatMapIndexed,
  fold,
  foldIndexed,
  reduce,
  reduceIndexed,
  tryReduce,
  tryReduceIndexed,
} from "./transform";

export { all, any, partition, distinct, distinctBy, groupBy } from "./grouping";

export { chunked, tryChunked, chunkedBy, windowed, tryWindowed } from "./segment";

export { zip, unzip } from "./combine";

export { takeWhile, dropWhile, takeLastWhile, dropLastWhile, reverse } from "./slicing";

export { getOrPut, entriesOf, foldEntries, transformMap } from "./maps";

export { pair, first, second, swap, formatPair } from "./pair";

export { createMemoTable, memoize } from "./memo-table";

export {
  InvalidArgumentError,
  EmptyInputError,
  isInvalidArgumentError,
  isEmptyInputError,
  isListwiseError,
} from "./errors";

export { TaggedError } from "./tagged-error";

export { ok, err, isOk, isErr, unwrap, unwrapOr, mapResult, matchResult } from "./result";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { Pair } from "./pair";

export type {
  MemoTable,
  MemoTableEvent,
  MemoTableOptions,
  MemoTableStats,
  MemoizeOptions,
  MemoizedFunction,
} from "./memo-table";

export type { ListwiseError } from "./errors";

export type {
  TaggedErrorBase,
  TaggedErrorOptions,
  TaggedErrorCreateOptions,
  TaggedErrorConstructor,
  TagOf,
  PropsOf,
  ErrorByTag,
} from "./tagged-error";

export type { Ok, Err, Result } from "./result";
