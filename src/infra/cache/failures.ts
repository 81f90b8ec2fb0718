/**
 * Failure kinds for stale-if-error decisions.
 *
 * A producer failure is matched by its `type` tag, the same field the
 * discriminated-union errors across the codebase carry. Thrown values
 * without a string `type` have no kind and never qualify for stale serving.
 */

/**
 * Error class for producers that throw instead of returning a Result.
 *
 * @example
 * ```typescript
 * throw new TaggedError('DatabaseError', 'Connection refused', { cause });
 * ```
 */
export class TaggedError<TType extends string = string> extends Error {
  readonly type: TType;

  constructor(type: TType, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = type;
    this.type = type;
  }
}

/**
 * Kind tag of a failure, if it carries one.
 */
export const failureKindOf = (failure: unknown): string | undefined => {
  if (failure === null || typeof failure !== 'object' || !('type' in failure)) {
    return undefined;
  }
  return typeof failure.type === 'string' ? failure.type : undefined;
};

/**
 * Human-readable message of a failure.
 */
export const failureMessageOf = (failure: unknown): string => {
  if (failure instanceof Error) return failure.message;
  if (failure !== null && typeof failure === 'object' && 'message' in failure) {
    if (typeof failure.message === 'string') return failure.message;
  }
  return String(failure);
};

/**
 * Whether a failure's kind is in the allow-list.
 */
export const isWhitelistedFailure = (
  failure: unknown,
  whitelistedKinds: ReadonlySet<string>
): boolean => {
  const kind = failureKindOf(failure);
  return kind !== undefined && whitelistedKinds.has(kind);
};
