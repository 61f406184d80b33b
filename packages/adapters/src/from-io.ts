/**
 * Node I/O errors (`fs`, `net`, streams) as error chains
 */

import { StackError, codeFromIoKind } from '@errstack/core';
import type { AdapterOptions } from './options.js';

/**
 * Root node whose payload is the I/O error itself, classified by its
 * `code` (errno name) when the kind is mapped
 */
export function fromIoError(error: NodeJS.ErrnoException, options: AdapterOptions = {}): StackError {
  const root = StackError.from(error);
  const code = error.code === undefined ? undefined : codeFromIoKind(error.code);
  if (code === undefined) {
    options.logger?.debug({ kind: error.code, syscall: error.syscall }, 'unmapped I/O error kind');
    return root;
  }
  return root.withCode(code);
}
