/**
 * @errstack/adapters - Conversions from external failures into error chains
 */

export type { AdapterOptions } from './options.js';
export { fromIoError } from './from-io.js';
export { fromHttpStatus } from './from-http.js';
export {
  type HttpClientFailure,
  fromAxiosError,
  fromHttpClientError,
  fromRequestFailure
} from './from-http-client.js';
