/**
 * Stacking contract
 *
 * Every error type in errstack, base or derived, implements these.
 * Operations never mutate: each returns a new value of the same type.
 */

import { inspect } from 'node:util';
import type { ErrorCodeType } from './codes/index.js';
import type { RenderOptions } from './schemas.js';

/**
 * Anything that can be rendered as a message line
 */
export type Displayable = string | number | bigint | boolean | Error | { toString(): string };

/**
 * Code and URI accessors plus stacking
 */
export interface ErrorStacks<Self, C = ErrorCodeType> {
  /** Code of the topmost node */
  readonly code: C | undefined;
  /** URI of the topmost node */
  readonly uri: string | undefined;
  withCode(code: C): Self;
  clearCode(): Self;
  withUri(uri: string): Self;
  clearUri(): Self;
  /** Replace the message of the topmost node */
  withMessage(message: Displayable): Self;
  clearMessage(): Self;
  /**
   * Push a new node on top. Code and URI are copied from the current top.
   * (`stack` itself is taken by `Error.prototype.stack`.)
   */
  stackErr(message?: Displayable): Self;
}

/**
 * Rendering and cause introspection
 */
export interface ErrorChain {
  readonly message: string;
  readonly cause?: unknown;
  /** Messages of the nodes that carry one, root first */
  messages(): string[];
  render(options?: Partial<RenderOptions>): string;
}

export type StackingError<Self, C = ErrorCodeType> = ErrorStacks<Self, C> & ErrorChain;

/**
 * String form of any value. Objects that cannot be converted to a
 * primitive (null prototype, a `toString` returning an object) are inspected.
 */
export function displayString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return inspect(value);
  }
}

/**
 * Render a message payload
 */
export function formatMessage(payload: Displayable): string {
  if (payload instanceof Error) {
    return payload.message;
  }
  return displayString(payload);
}
