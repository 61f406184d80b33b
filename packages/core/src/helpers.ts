/**
 * Call-site helpers for building and stacking errors inside Result flows
 */

import type { Displayable, ErrorStacks } from './contract.js';
import type { StackErrorFactory } from './derive.js';
import { type Err, err } from './result.js';

/**
 * Stacking callback for `mapErr`
 *
 * @example mapErr(loadUser(id), stackMap('while loading the profile page'))
 */
export const stackMap =
  (message?: Displayable) =>
  <E extends ErrorStacks<E, unknown>>(error: E): E =>
    error.stackErr(message);

/**
 * Lazy root constructor, for fallbacks that only build an error when needed
 */
export const stackElse =
  <E>(factory: StackErrorFactory<E>, message: Displayable) =>
  (): E =>
    factory.from(message);

/**
 * Failed result holding a new root error
 */
export const failWith = <E>(factory: StackErrorFactory<E>, message: Displayable): Err<E> =>
  err(factory.from(message));
