/**
 * Wrapper generator
 *
 * `deriveStackError` builds a nominal error type around exactly one inner
 * error type. Every contract method unwraps, delegates to the inner value
 * and re-wraps, so the derived type renders and classifies exactly like
 * the type it wraps.
 *
 * @example
 * ```ts
 * const LibError = deriveStackError('LibError', [StackError]);
 * type LibError = InstanceType<typeof LibError>;
 *
 * const error = LibError.from('Base error').withCode(ErrorCode.IoNotFound).stackErr('Stacked');
 * ```
 */

import type { ErrorCodeType } from './codes/index.js';
import type { Displayable, StackingError } from './contract.js';
import type { RenderOptions } from './schemas.js';

/**
 * What the single field of a wrapper must provide: a class (or any value)
 * that builds the inner error
 */
export type StackErrorFactory<Inner> = {
  readonly name: string;
  from(message: Displayable): Inner;
  empty(): Inner;
};

export interface DerivedStackError<Name extends string, Inner, C = ErrorCodeType>
  extends Error,
    StackingError<DerivedStackError<Name, Inner, C>, C> {
  readonly name: Name;
  readonly inner: Inner;
}

export interface DerivedStackErrorClass<Name extends string, Inner, C = ErrorCodeType> {
  new (inner: Inner): DerivedStackError<Name, Inner, C>;
  readonly name: string;
  from(message: Displayable): DerivedStackError<Name, Inner, C>;
  empty(): DerivedStackError<Name, Inner, C>;
}

/**
 * Thrown when a wrapper is declared with the wrong shape
 */
export class WrapperDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WrapperDefinitionError';
  }
}

/**
 * Derive a named wrapper error type.
 *
 * `fields` lists the wrapper's fields and must hold exactly one entry; any
 * other arity is a type error, and throws `WrapperDefinitionError` when the
 * types are bypassed.
 */
export function deriveStackError<
  const Name extends string,
  Inner extends StackingError<Inner, C>,
  C = ErrorCodeType
>(name: Name, fields: readonly [StackErrorFactory<Inner>]): DerivedStackErrorClass<Name, Inner, C> {
  const count: number = fields.length;
  if (count !== 1) {
    throw new WrapperDefinitionError(
      `${name}: a stack error wrapper must declare exactly one field, found ${count}`
    );
  }
  const [factory] = fields;
  if (typeof factory?.from !== 'function' || typeof factory.empty !== 'function') {
    throw new WrapperDefinitionError(
      `${name}: the wrapped type must provide static from() and empty() constructors`
    );
  }

  class Derived extends Error implements DerivedStackError<Name, Inner, C> {
    declare readonly name: Name;
    declare readonly cause: unknown;
    readonly inner: Inner;

    constructor(inner: Inner) {
      super(inner.message);
      this.name = name;
      this.inner = inner;
      this.cause = inner.cause;

      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, Derived);
      }
    }

    static from(message: Displayable): Derived {
      return new Derived(factory.from(message));
    }

    static empty(): Derived {
      return new Derived(factory.empty());
    }

    get code(): C | undefined {
      return this.inner.code;
    }

    get uri(): string | undefined {
      return this.inner.uri;
    }

    withCode(code: C): Derived {
      return new Derived(this.inner.withCode(code));
    }

    clearCode(): Derived {
      return new Derived(this.inner.clearCode());
    }

    withUri(uri: string): Derived {
      return new Derived(this.inner.withUri(uri));
    }

    clearUri(): Derived {
      return new Derived(this.inner.clearUri());
    }

    withMessage(message: Displayable): Derived {
      return new Derived(this.inner.withMessage(message));
    }

    clearMessage(): Derived {
      return new Derived(this.inner.clearMessage());
    }

    stackErr(message?: Displayable): Derived {
      return new Derived(this.inner.stackErr(message));
    }

    messages(): string[] {
      return this.inner.messages();
    }

    render(options?: Partial<RenderOptions>): string {
      return this.inner.render(options);
    }

    toString(): string {
      return this.inner.render();
    }
  }

  Object.defineProperty(Derived, 'name', { value: name });
  return Derived;
}
