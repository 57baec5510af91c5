/**
 * Type tests for listwise
 * Run with: npm run test:types
 */
import { expectType } from "tsd";
import {
  Listwise,
  TaggedError,
  chunked,
  groupBy,
  partition,
  zip,
  unzip,
  filterMap,
  tryReduce,
  transformMap,
  createMemoTable,
  memoize,
  type Pair,
  type Result,
  type EmptyInputError,
  type ListwiseError,
  type TagOf,
  type PropsOf,
  type ErrorByTag,
  type TaggedErrorConstructor,
  type TaggedErrorOptions,
} from "./index";

// =============================================================================
// Sequences
// =============================================================================

expectType<number[][]>(chunked([1, 2, 3], 2));
expectType<Map<string, number[]>>(groupBy(["a"], (s) => [s, s.length] as const));
expectType<[matching: string[], nonMatching: string[]]>(partition(["a"], (s) => s === "a"));
expectType<number[]>(filterMap(["1"], (s) => [Number(s), true] as const));

// =============================================================================
// Pairs
// =============================================================================

const zipped = zip([1], ["a"]);
expectType<Pair<number, string>[]>(zipped);
expectType<[first: number[], second: string[]]>(unzip(zipped));

// =============================================================================
// Results and errors
// =============================================================================

expectType<Result<number, EmptyInputError>>(tryReduce([1], (a, b) => a + b));
declare const anyError: ListwiseError;
declare const emptyProps: PropsOf<EmptyInputError>;
declare const emptyTag: TagOf<EmptyInputError>;

expectType<"InvalidArgumentError" | "EmptyInputError">(anyError._tag);
expectType<{ operation: string }>(emptyProps);
expectType<"EmptyInputError">(emptyTag);

declare const emptyByTag: ErrorByTag<ListwiseError, "EmptyInputError">;
expectType<EmptyInputError>(emptyByTag);

const codeOptions: TaggedErrorOptions<{ code: number }> = {
  message: (props) => `failed with code ${props.code}`,
};
expectType<TaggedErrorConstructor<"CodeError", { code: number }>>(
  TaggedError("CodeError", codeOptions)
);

// =============================================================================
// Maps and memo
// =============================================================================

expectType<Map<string, boolean>>(
  transformMap(new Map([[1, "x"]]), (k, v) => [v, k > 0, true] as const)
);

const table = createMemoTable<string, number>();
expectType<number>(table.getOrPut("k", () => 1));
expectType<number | undefined>(table.get("k"));

const memoLength = memoize((s: string) => s.length);
expectType<number>(memoLength("abc"));

expectType<typeof chunked>(Listwise.chunked);
