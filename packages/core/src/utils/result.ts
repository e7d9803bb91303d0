/**
 * Result type for explicit error handling
 */

import type { TidewatchError } from '../errors/tidewatch-error.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E = TidewatchError> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - Either Ok or Err
 */
export type Result<T, E = TidewatchError> = Ok<T> | Err<E>;

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

export const err = <E = TidewatchError>(error: E): Err<E> => ({
  ok: false,
  error
});

/**
 * Map over a successful result
 */
export const map = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> => {
  if (isOk(result)) {
    return ok(fn(result.value));
  }
  return result;
};

/**
 * Chain Result computations
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => {
  if (isOk(result)) {
    return fn(result.value);
  }
  return result;
};

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T => {
  if (isOk(result)) {
    return result.value;
  }
  return defaultValue;
};

/**
 * Async try/catch wrapper that returns Result
 */
export const tryCatchAsync = async <T, E>(
  fn: () => Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
