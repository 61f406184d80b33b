/**
 * Stacking contract lifted over Result
 *
 * Each function touches the Err branch only; an Ok result is returned as
 * the same object, so lifting never invents or discards a value.
 */

import type { Displayable, ErrorStacks } from './contract.js';
import { type Result, isErr, mapErr } from './result.js';

type Stacks<E> = ErrorStacks<E, unknown>;

/**
 * Code type accepted by an error type's `withCode`
 */
export type CodeOf<E extends Stacks<E>> = Parameters<E['withCode']>[0];

export const errCode = <T, E extends Stacks<E>>(result: Result<T, E>): E['code'] | undefined =>
  isErr(result) ? result.error.code : undefined;

export const errUri = <T, E extends Stacks<E>>(result: Result<T, E>): string | undefined =>
  isErr(result) ? result.error.uri : undefined;

export const withErrCode = <T, E extends Stacks<E>>(
  result: Result<T, E>,
  code: CodeOf<E>
): Result<T, E> => mapErr(result, (error) => error.withCode(code));

export const clearErrCode = <T, E extends Stacks<E>>(result: Result<T, E>): Result<T, E> =>
  mapErr(result, (error) => error.clearCode());

export const withErrUri = <T, E extends Stacks<E>>(result: Result<T, E>, uri: string): Result<T, E> =>
  mapErr(result, (error) => error.withUri(uri));

export const clearErrUri = <T, E extends Stacks<E>>(result: Result<T, E>): Result<T, E> =>
  mapErr(result, (error) => error.clearUri());

export const withErrMessage = <T, E extends Stacks<E>>(
  result: Result<T, E>,
  message: Displayable
): Result<T, E> => mapErr(result, (error) => error.withMessage(message));

export const clearErrMessage = <T, E extends Stacks<E>>(result: Result<T, E>): Result<T, E> =>
  mapErr(result, (error) => error.clearMessage());

/**
 * Stack a message on a failed result
 */
export const stackErr = <T, E extends Stacks<E>>(
  result: Result<T, E>,
  message?: Displayable
): Result<T, E> => mapErr(result, (error) => error.stackErr(message));
