/**
 * Result type for functional error handling
 * Failures are explicit values; StackError is the default error type.
 */

import type { StackError } from './stack-error.js';

/**
 * Success result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error result
 */
export interface Err<E = StackError> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - Either Ok or Err
 */
export type Result<T, E = StackError> = Ok<T> | Err<E>;

export type StackResult<T> = Result<T, StackError>;

/**
 * Type guard to check if result is Ok
 */
export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

/**
 * Type guard to check if result is Err
 */
export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

/**
 * Create a success result
 */
export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

/**
 * Create an error result
 */
export const err = <E = StackError>(error: E): Err<E> => ({
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
 * Map over an error result. Ok results are returned as they are.
 */
export const mapErr = <T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> => {
  if (isErr(result)) {
    return err(fn(result.error));
  }
  return result;
};

/**
 * Unwrap result or throw error
 */
export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
};

/**
 * Unwrap result or return default value
 */
export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T => {
  if (isOk(result)) {
    return result.value;
  }
  return defaultValue;
};

/**
 * Try/catch wrapper that returns Result
 */
export const tryCatch = <T, E = StackError>(
  fn: () => T,
  errorMapper: (error: unknown) => E
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};

/**
 * Async try/catch wrapper that returns Result
 */
export const tryCatchAsync = async <T, E = StackError>(
  fn: () => Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    const value = await fn();
    return ok(value);
  } catch (error) {
    return err(errorMapper(error));
  }
};

/**
 * Convert promise to Result
 */
export const fromPromise = <T, E = StackError>(
  promise: Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => tryCatchAsync(() => promise, errorMapper);
