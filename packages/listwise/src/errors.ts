/**
 * listwise/errors
 *
 * Error types raised by precondition checks.
 * Uses TaggedError so callers can discriminate on `_tag`.
 *
 * @example
 * ```typescript
 * import { chunked } from 'listwise';
 * import { isInvalidArgumentError } from 'listwise/errors';
 *
 * try {
 *   chunked(rows, 0);
 * } catch (error) {
 *   if (isInvalidArgumentError(error)) {
 *     console.log(error.props.argument); // "size"
 *   }
 * }
 * ```
 */

import { TaggedError } from "./tagged-error";

// =============================================================================
// Error Types
// =============================================================================

/**
 * Thrown when a segmentation size or step is not a positive integer.
 *
 * @example
 * ```typescript
 * const error = new InvalidArgumentError({
 *   operation: 'chunked',
 *   argument: 'size',
 *   value: 0,
 * });
 * console.log(error.message);
 * // "InvalidArgumentError: chunked requires size to be a positive integer, got 0"
 * ```
 */
export class InvalidArgumentError extends TaggedError("InvalidArgumentError", {
  message: (p: {
    /** Name of the operation that rejected the argument */
    operation: string;
    /** Name of the offending parameter */
    argument: string;
    /** Value that was passed */
    value: number;
  }) =>
    `InvalidArgumentError: ${p.operation} requires ${p.argument} to be a positive integer, got ${p.value}`,
}) {}

/**
 * Thrown when an operation that needs at least one element gets none.
 *
 * @example
 * ```typescript
 * const error = new EmptyInputError({ operation: 'reduce' });
 * console.log(error.message); // "EmptyInputError: reduce requires a non-empty sequence"
 * ```
 */
export class EmptyInputError extends TaggedError("EmptyInputError", {
  message: (p: {
    /** Name of the operation that received empty input */
    operation: string;
  }) => `EmptyInputError: ${p.operation} requires a non-empty sequence`,
}) {}

/**
 * Union of every error this library raises.
 */
export type ListwiseError = InvalidArgumentError | EmptyInputError;

// =============================================================================
// Precondition Helpers
// =============================================================================

/**
 * Build an InvalidArgumentError if `value` is not a positive integer.
 * Returns undefined when the value is acceptable.
 */
export function checkPositiveInteger(
  operation: string,
  argument: string,
  value: number
): InvalidArgumentError | undefined {
  if (Number.isInteger(value) && value > 0) return undefined;
  return new InvalidArgumentError({ operation, argument, value });
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is an InvalidArgumentError.
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

/**
 * Check if an error is an EmptyInputError.
 */
export function isEmptyInputError(error: unknown): error is EmptyInputError {
  return error instanceof EmptyInputError;
}

/**
 * Check if an error is any ListwiseError.
 */
export function isListwiseError(error: unknown): error is ListwiseError {
  if (!TaggedError.isTaggedError(error)) return false;
  return error._tag === "InvalidArgumentError" || error._tag === "EmptyInputError";
}
