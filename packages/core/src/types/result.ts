/**
 * Result<T, E> type for functional error handling
 * Used by the resource loaders so callers decide whether a bad file is fatal
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

export function err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Get the value or throw the error
 * Use sparingly - prefer pattern matching with isOk/isErr
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (isOk(result)) return result.value;
  throw result.error;
}

/**
 * Transform the success value, passing errors through untouched
 */
export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}
