/**
 * HTTP client failures as error chains
 */

import { StackError, codeFromIoKind } from '@errstack/core';
import axios, { type AxiosError } from 'axios';
import { fromHttpStatus } from './from-http.js';
import type { AdapterOptions } from './options.js';

/**
 * What any HTTP client reports about a failed request
 */
export type HttpClientFailure = {
  message: string;
  status?: number;
};

/**
 * Chain for a failed request. With a status the client's message is
 * stacked on the status node and inherits its code; without one the
 * message is the root.
 */
export function fromHttpClientError(failure: HttpClientFailure, options: AdapterOptions = {}): StackError {
  if (failure.status === undefined) {
    return StackError.from(failure.message);
  }
  return fromHttpStatus(failure.status, options).stackErr(failure.message);
}

/**
 * Chain for an axios error
 *
 * Requests that never got a response (refused, reset, timed out) are
 * classified by the network error kind axios copies into `error.code`.
 */
export function fromAxiosError(error: AxiosError, options: AdapterOptions = {}): StackError {
  const status = error.response?.status;
  if (status !== undefined) {
    return fromHttpClientError({ message: error.message, status }, options);
  }

  const root = fromHttpClientError({ message: error.message }, options);
  const code = error.code === undefined ? undefined : codeFromIoKind(error.code);
  return code === undefined ? root : root.withCode(code);
}

/**
 * Chain for anything thrown by an axios call
 */
export function fromRequestFailure(error: unknown, options: AdapterOptions = {}): StackError {
  if (axios.isAxiosError(error)) {
    return fromAxiosError(error, options);
  }
  return StackError.fromUnknown(error);
}
