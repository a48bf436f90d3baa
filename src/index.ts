/**
 * wirereq: minimal HTTP/1.1 client over raw TCP/TLS sockets.
 */

// Main API
export {
  request,
  createRequest,
  get,
  head,
  post,
  put,
  del,
  connect,
  options,
  trace,
  patch,
} from "./client.js";
export type { RequestOptions } from "./client.js";
export { Request } from "./http1/request.js";
export type { HttpResponse } from "./http1/response.js";
export { dispatch } from "./connection.js";
export type { SendOptions } from "./connection.js";

// Methods and statuses
export { customMethod, methodToString, STANDARD_METHODS } from "./http/method.js";
export type { Method, StandardMethod, CustomMethod } from "./http/method.js";
export { classifyStatus, statusFromCode, isSuccess, isRedirect, formatStatus } from "./http/status.js";
export type { Status, StatusBand } from "./http/status.js";

// Errors
export {
  WireRequestError,
  ConfigurationError,
  TransportError,
  MalformedResponseError,
  DecompressionError,
  TooManyRedirectsError,
} from "./errors.js";
export type { WireRequestErrorCode } from "./errors.js";

// HTTP/1.1 internals (advanced usage)
export { http1Request } from "./http1/client.js";
export type { Http1Request, Http1Response } from "./http1/client.js";
export { parseStatusLine, parseHeaderLine, MISSING_STATUS_LINE_REASON } from "./http1/parser.js";
export { detectDecoder } from "./http1/decoder.js";
export type { Decoder, ContentCoding } from "./http1/decoder.js";

// Socket layer (advanced usage)
export { plainConnector } from "./socket/connector.js";
export type { SocketConnector, ConnectTarget } from "./socket/connector.js";
export { createTlsConnector, tlsConnector, hasTlsSupport } from "./socket/tls.js";
export type { Connectors, TlsConnectorOptions } from "./socket/tls.js";

// Configuration
export { TIMEOUT_ENV_VAR, timeoutFromEnv } from "./config.js";

// Protocol utilities
export { parseUrl } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";
export type { HeaderMap } from "./utils/headers.js";
