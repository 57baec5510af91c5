/**
 * listwise/errors entry point
 *
 * Error types raised by precondition checks.
 */
export {
  // Error types
  InvalidArgumentError,
  EmptyInputError,
  // Union type
  type ListwiseError,
  // Type guards
  isInvalidArgumentError,
  isEmptyInputError,
  isListwiseError,
} from "./errors";

export {
  TaggedError,
  type TaggedErrorBase,
  type TagOf,
  type PropsOf,
  type ErrorByTag,
} from "./tagged-error";
