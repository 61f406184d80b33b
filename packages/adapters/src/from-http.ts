/**
 * HTTP status codes as error chains
 */

import { STATUS_CODES } from 'node:http';
import { StackError, codeFromHttpStatus } from '@errstack/core';
import type { AdapterOptions } from './options.js';

/**
 * Root node for an HTTP status
 *
 * The message is "<status> <reason>" (e.g. "404 Not Found"), or the bare
 * number when Node knows no reason phrase. Statuses outside the code table
 * produce an unclassified node.
 */
export function fromHttpStatus(status: number, options: AdapterOptions = {}): StackError {
  const reason = STATUS_CODES[status];
  const root = StackError.from(reason === undefined ? status : `${status} ${reason}`);
  const code = codeFromHttpStatus(status);
  if (code === undefined) {
    options.logger?.debug({ status }, 'unmapped HTTP status');
    return root;
  }
  return root.withCode(code);
}
