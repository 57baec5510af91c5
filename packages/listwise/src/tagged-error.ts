/**
 * listwise/tagged-error (internal)
 *
 * Error classes with a literal `_tag` discriminant and typed props.
 *
 * @example
 * ```typescript
 * class KeyMissing extends TaggedError("KeyMissing", {
 *   message: (p: { key: string }) => `KeyMissing: ${p.key}`,
 * }) {}
 *
 * const error = new KeyMissing({ key: "a" });
 * error._tag; // "KeyMissing"
 * error.props.key; // "a"
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Instance shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string, P extends object = object>
  extends Error {
  readonly _tag: Tag;
  readonly props: Readonly<P>;
}

/**
 * Options accepted by the `TaggedError` factory.
 */
export interface TaggedErrorOptions<P extends object> {
  /**
   * Builds the error message from the props.
   * Default: the tag itself.
   */
  message?: (props: P) => string;
}

/**
 * Options accepted when constructing an instance.
 */
export interface TaggedErrorCreateOptions {
  cause?: unknown;
}

export type TaggedErrorConstructor<Tag extends string, P extends object> = abstract new (
  props: P,
  options?: TaggedErrorCreateOptions
) => TaggedErrorBase<Tag, P>;

/** Extract the tag of a tagged error type. */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/** Extract the props of a tagged error type. */
export type PropsOf<E> = E extends TaggedErrorBase<string, infer P> ? P : never;

/** Select the member of a tagged error union carrying the given tag. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { readonly _tag: Tag }>;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an abstract base class for a tagged error.
 *
 * Subclass the returned class to get a nominal error type:
 * `class Foo extends TaggedError("Foo", { message }) {}`.
 */
export function TaggedError<Tag extends string, P extends object = Record<string, never>>(
  tag: Tag,
  options: TaggedErrorOptions<P> = {}
): TaggedErrorConstructor<Tag, P> {
  const format = options.message ?? (() => tag);

  abstract class Tagged extends Error implements TaggedErrorBase<Tag, P> {
    readonly _tag: Tag = tag;
    readonly props: Readonly<P>;

    constructor(props: P, createOptions?: TaggedErrorCreateOptions) {
      super(
        format(props),
        createOptions?.cause !== undefined ? { cause: createOptions.cause } : undefined
      );
      this.name = tag;
      this.props = Object.freeze({ ...props });
    }
  }

  return Tagged;
}

/**
 * Check whether a value is an instance created through `TaggedError`.
 */
function isTaggedError(value: unknown): value is TaggedErrorBase {
  return (
    value instanceof Error &&
    "_tag" in value &&
    typeof value._tag === "string" &&
    "props" in value &&
    typeof value.props === "object" &&
    value.props !== null
  );
}

TaggedError.isTaggedError = isTaggedError;
