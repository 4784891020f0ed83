/**
 * wire-client: minimal HTTP/1.1 client over a raw TCP/TLS socket.
 */

// Main API
export { HttpClient, request } from "./client.js";
export type { ClientOptions, RequestOptions } from "./client.js";
export { HttpError, ResponseError, UriError } from "./errors.js";
export type { HttpErrorKind, ResponseErrorKind, UriErrorKind } from "./errors.js";

// HTTP/1.1 building blocks (advanced usage)
export {
  createRequest,
  getRequestLine,
  httpVersionFor,
  serializeRequestHead,
  writeRequestHead,
} from "./http1/request.js";
export type { HttpMethod, HttpRequest, RequestInit } from "./http1/request.js";
export { HttpResponse } from "./http1/response.js";
export { ResponseParser, parseStatusLine, parseHeaderLine } from "./http1/parser.js";
export type { ParserState, ResponseHead } from "./http1/parser.js";
export { SocketReader } from "./http1/stream-reader.js";
export { StatusCode } from "./http1/status.js";

// Socket layer (advanced usage)
export { createSocket } from "./socket/tls.js";
export type { SocketFactory, SocketOptions } from "./socket/tls.js";

// Protocol utilities
export { HttpHeaders, defaultHeaders } from "./utils/headers.js";
export type { HeaderInput } from "./utils/headers.js";
export { parseUri, resolveAddress, resolvePort, encodePath, defaultPort } from "./utils/url.js";
export type { Uri, Protocol } from "./utils/url.js";
