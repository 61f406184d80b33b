import { describe, expect, expectTypeOf, it } from 'vitest';
import { ErrorCode } from './codes/index.js';
import { WrapperDefinitionError, deriveStackError } from './derive.js';
import { stackErr, withErrCode } from './result-stacks.js';
import { err, isErr } from './result.js';
import { StackError } from './stack-error.js';

const LibError = deriveStackError('LibError', [StackError]);
type LibError = InstanceType<typeof LibError>;

const ApiError = deriveStackError('ApiError', [LibError]);
type ApiError = InstanceType<typeof ApiError>;

describe('deriveStackError', () => {
  describe('construction', () => {
    it('should build from a message', () => {
      const error = LibError.from('Custom error');

      expect(error.toString()).toBe('Custom error');
      expect(error.message).toBe('Custom error');
      expect(error.inner).toBeInstanceOf(StackError);
    });

    it('should build an empty root', () => {
      expect(LibError.empty().render()).toBe('');
    });

    it('should wrap an existing inner error', () => {
      const inner = StackError.from('Base error').withCode(ErrorCode.HttpConflict);
      const error = new LibError(inner);

      expect(error.inner).toBe(inner);
      expect(error.code).toBe(ErrorCode.HttpConflict);
    });

    it('should be a named Error type', () => {
      const error = LibError.from('Custom error');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(LibError);
      expect(error).not.toBeInstanceOf(StackError);
      expect(error.name).toBe('LibError');
      expect(LibError.name).toBe('LibError');
      expect(() => {
        throw error;
      }).toThrow(LibError);
    });
  });

  describe('delegation', () => {
    it('should set code and URI', () => {
      const error = LibError.from('Coded error')
        .withCode(ErrorCode.IoInvalidInput)
        .withUri('https://example.com/custom');

      expect(error.code).toBe(ErrorCode.IoInvalidInput);
      expect(error.uri).toBe('https://example.com/custom');
      expect(error.clearCode().code).toBeUndefined();
      expect(error.clearUri().uri).toBeUndefined();
    });

    it('should stack like the base type', () => {
      const stacked = LibError.from('Base error')
        .withCode(ErrorCode.IoInvalidInput)
        .withUri('https://example.com/base_custom')
        .stackErr('Stacked error');

      expect(stacked).toBeInstanceOf(LibError);
      expect(stacked.toString()).toBe('Base error\nStacked error');
      expect(stacked.code).toBe(ErrorCode.IoInvalidInput);
      expect(stacked.uri).toBe('https://example.com/base_custom');
    });

    it('should expose the inner cause', () => {
      const stacked = LibError.from('Base error').stackErr('Stacked error');

      expect(stacked.cause).toBe(stacked.inner.cause);
      expect(stacked.cause).toBeInstanceOf(StackError);
      expect(LibError.from('Root').cause).toBeUndefined();
    });

    it('should match the base type for any operation sequence', () => {
      const base = StackError.from('rate limited')
        .withCode(ErrorCode.HttpTooManyRequests)
        .stackErr('retry budget exhausted')
        .withUri('https://example.com/limits')
        .stackErr()
        .withMessage('giving up')
        .clearCode()
        .stackErr('sync aborted');
      const derived = LibError.from('rate limited')
        .withCode(ErrorCode.HttpTooManyRequests)
        .stackErr('retry budget exhausted')
        .withUri('https://example.com/limits')
        .stackErr()
        .withMessage('giving up')
        .clearCode()
        .stackErr('sync aborted');

      expect(derived.render()).toBe(base.render());
      expect(derived.render({ numbered: true })).toBe(base.render({ numbered: true }));
      expect(derived.code).toBe(base.code);
      expect(derived.uri).toBe(base.uri);
      expect(derived.render()).toBe('rate limited\nretry budget exhausted\ngiving up\nsync aborted');
    });

    it('should render message-less levels like the base type', () => {
      const base = StackError.empty().stackErr('a').stackErr().stackErr('b');
      const derived = LibError.empty().stackErr('a').stackErr().stackErr('b');

      expect(derived.render()).toBe('\na\n\nb');
      expect(derived.render()).toBe(base.render());
      expect(derived.messages()).toEqual(['a', 'b']);
    });

    it('should not modify the receiver', () => {
      const base = LibError.from('Base error');
      base.withCode(ErrorCode.HttpGone).stackErr('Stacked error');

      expect(base.code).toBeUndefined();
      expect(base.render()).toBe('Base error');
    });
  });

  describe('nesting', () => {
    it('should wrap a derived type', () => {
      const error = ApiError.from('Base error').withCode(ErrorCode.HttpBadGateway).stackErr('Stacked error');

      expect(error).toBeInstanceOf(ApiError);
      expect(error.inner).toBeInstanceOf(LibError);
      expect(error.inner.inner).toBeInstanceOf(StackError);
      expect(error.render()).toBe('Base error\nStacked error');
      expect(error.code).toBe(ErrorCode.HttpBadGateway);
    });
  });

  describe('Result lifting', () => {
    it('should work on results holding a derived error', () => {
      const result = stackErr(
        withErrCode(err(LibError.from('Base error')), ErrorCode.RuntimeNotImplemented),
        'Stacked error'
      );

      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBeInstanceOf(LibError);
        expect(result.error.render()).toBe('Base error\nStacked error');
        expect(result.error.code).toBe(ErrorCode.RuntimeNotImplemented);
      }
    });
  });

  describe('declaration', () => {
    it('should require exactly one field in its signature', () => {
      expectTypeOf<Parameters<typeof deriveStackError>[1]['length']>().toEqualTypeOf<1>();
    });

    it('should give each derived type its own name type', () => {
      expectTypeOf<LibError['name']>().toEqualTypeOf<'LibError'>();
      expectTypeOf<ApiError['name']>().toEqualTypeOf<'ApiError'>();
    });

    it('should reject other field counts when the types are bypassed', () => {
      expect(() => Reflect.apply(deriveStackError, undefined, ['NoFields', []])).toThrow(
        WrapperDefinitionError
      );
      expect(() =>
        Reflect.apply(deriveStackError, undefined, ['TwoFields', [StackError, StackError]])
      ).toThrow('TwoFields: a stack error wrapper must declare exactly one field, found 2');
    });

    it('should reject a field type without constructors', () => {
      expect(() => Reflect.apply(deriveStackError, undefined, ['Plain', [{ name: 'Plain' }]])).toThrow(
        WrapperDefinitionError
      );
    });
  });
});
