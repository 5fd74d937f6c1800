/**
 * Result type shared by every fallible operation in the library.
 * Operations return a Result instead of throwing.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Wraps a value in a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Wraps an error in a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/**
 * Applies `fn` to the value of a successful Result; failures pass through.
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Applies `fn` to the error of a failed Result; successes pass through.
 */
export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> => (result.success ? result : err(fn(result.error)));

/**
 * Chains a Result-returning step, stopping at the first failure.
 *
 * @example
 * ```ts
 * const payload = flatMapResult(buildKey(table, key), (keyMap) =>
 *   ok({ TableName: table.tableName, Key: keyMap }),
 * );
 * ```
 */
export const flatMapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> => (result.success ? fn(result.data) : result);
