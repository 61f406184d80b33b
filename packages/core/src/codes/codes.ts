/**
 * Classification codes for errstack
 *
 * A closed, flat set: runtime codes defined here, plus HTTP 4xx/5xx and
 * Node I/O codes mirrored one-for-one from their external namespaces.
 */

export const ErrorCode = {
  // Runtime
  RuntimeInvalidValue: 'RuntimeInvalidValue',
  RuntimeInvalidIndex: 'RuntimeInvalidIndex',
  RuntimeInvalidKey: 'RuntimeInvalidKey',
  RuntimeNotImplemented: 'RuntimeNotImplemented',

  // HTTP 4xx
  HttpBadRequest: 'HttpBadRequest',
  HttpUnauthorized: 'HttpUnauthorized',
  HttpPaymentRequired: 'HttpPaymentRequired',
  HttpForbidden: 'HttpForbidden',
  HttpNotFound: 'HttpNotFound',
  HttpMethodNotAllowed: 'HttpMethodNotAllowed',
  HttpNotAcceptable: 'HttpNotAcceptable',
  HttpProxyAuthenticationRequired: 'HttpProxyAuthenticationRequired',
  HttpRequestTimeout: 'HttpRequestTimeout',
  HttpConflict: 'HttpConflict',
  HttpGone: 'HttpGone',
  HttpLengthRequired: 'HttpLengthRequired',
  HttpPreconditionFailed: 'HttpPreconditionFailed',
  HttpPayloadTooLarge: 'HttpPayloadTooLarge',
  HttpUriTooLong: 'HttpUriTooLong',
  HttpUnsupportedMediaType: 'HttpUnsupportedMediaType',
  HttpRangeNotSatisfiable: 'HttpRangeNotSatisfiable',
  HttpExpectationFailed: 'HttpExpectationFailed',
  HttpImATeapot: 'HttpImATeapot',
  HttpMisdirectedRequest: 'HttpMisdirectedRequest',
  HttpUnprocessableEntity: 'HttpUnprocessableEntity',
  HttpLocked: 'HttpLocked',
  HttpFailedDependency: 'HttpFailedDependency',
  HttpTooEarly: 'HttpTooEarly',
  HttpUpgradeRequired: 'HttpUpgradeRequired',
  HttpPreconditionRequired: 'HttpPreconditionRequired',
  HttpTooManyRequests: 'HttpTooManyRequests',
  HttpRequestHeaderFieldsTooLarge: 'HttpRequestHeaderFieldsTooLarge',
  HttpUnavailableForLegalReasons: 'HttpUnavailableForLegalReasons',

  // HTTP 5xx
  HttpInternalServerError: 'HttpInternalServerError',
  HttpNotImplemented: 'HttpNotImplemented',
  HttpBadGateway: 'HttpBadGateway',
  HttpServiceUnavailable: 'HttpServiceUnavailable',
  HttpGatewayTimeout: 'HttpGatewayTimeout',
  HttpHttpVersionNotSupported: 'HttpHttpVersionNotSupported',
  HttpVariantAlsoNegotiates: 'HttpVariantAlsoNegotiates',
  HttpInsufficientStorage: 'HttpInsufficientStorage',
  HttpLoopDetected: 'HttpLoopDetected',
  HttpNotExtended: 'HttpNotExtended',
  HttpNetworkAuthenticationRequired: 'HttpNetworkAuthenticationRequired',

  // I/O
  IoNotFound: 'IoNotFound',
  IoPermissionDenied: 'IoPermissionDenied',
  IoConnectionRefused: 'IoConnectionRefused',
  IoConnectionReset: 'IoConnectionReset',
  IoConnectionAborted: 'IoConnectionAborted',
  IoNotConnected: 'IoNotConnected',
  IoAddrInUse: 'IoAddrInUse',
  IoAddrNotAvailable: 'IoAddrNotAvailable',
  IoBrokenPipe: 'IoBrokenPipe',
  IoAlreadyExists: 'IoAlreadyExists',
  IoWouldBlock: 'IoWouldBlock',
  IoInvalidInput: 'IoInvalidInput',
  IoInvalidData: 'IoInvalidData',
  IoTimedOut: 'IoTimedOut',
  IoWriteZero: 'IoWriteZero',
  IoInterrupted: 'IoInterrupted',
  IoUnsupported: 'IoUnsupported',
  IoUnexpectedEof: 'IoUnexpectedEof',
  IoOutOfMemory: 'IoOutOfMemory',
  IoOther: 'IoOther'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const ERROR_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/**
 * Type guard for values read from untyped sources
 */
export function isErrorCode(value: unknown): value is ErrorCodeType {
  return typeof value === 'string' && ERROR_CODES.has(value);
}
