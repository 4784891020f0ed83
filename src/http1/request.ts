/**
 * Request construction and HTTP/1.1 head serialization.
 */
import { Buffer } from "node:buffer";
import type { Duplex } from "node:stream";
import {
  HttpHeaders,
  serializeHttp1Headers,
  validateMethod,
  validatePath,
  type HeaderInput,
} from "../utils/headers.js";
import { encodePath, parseUri, type Protocol, type Uri } from "../utils/url.js";

export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "DELETE"
  | "PATCH"
  | "HEAD"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE";

export interface HttpRequest {
  readonly method: HttpMethod;
  readonly uri: Uri;
  /** Per-request headers; merged over the client's defaults at send time */
  readonly headers: HttpHeaders;
  /** Connect timeout (ms), overrides the client's */
  readonly timeout?: number;
}

export interface RequestInit {
  headers?: HeaderInput;
  timeout?: number;
}

/**
 * The version label written into the request line.
 * "HTTP/2" for https is a label only: the bytes on the wire are HTTP/1.1 text.
 */
export function httpVersionFor(protocol: Protocol): string {
  switch (protocol) {
    case "http":
      return "HTTP/1.1";
    case "https":
      return "HTTP/2";
  }
}

/**
 * Build an immutable request. The request's own headers start with Host
 * (with the port when the URI names one); `init.headers` are applied on top.
 * @throws {UriError} if `uri` is text that does not parse
 * @throws {Error} on an unsafe method, path or header
 */
export function createRequest(
  method: HttpMethod,
  uri: string | Uri,
  init: RequestInit = {},
): HttpRequest {
  validateMethod(method);
  const parsed = typeof uri === "string" ? parseUri(uri) : uri;
  validatePath(encodePath(parsed));

  const headers = new HttpHeaders();
  headers.setHost(parsed.port === undefined ? parsed.hostname : `${parsed.hostname}:${parsed.port}`);
  const combined = headers.combine(HttpHeaders.from(init.headers));

  return Object.freeze({ method, uri: parsed, headers: combined, timeout: init.timeout });
}

/** "GET /path HTTP/1.1" */
export function getRequestLine(request: HttpRequest): string {
  return `${request.method} /${encodePath(request.uri)} ${httpVersionFor(request.uri.protocol)}`;
}

/**
 * Serialize the request head: request line, one line per header, then
 * CRLF CRLF. Servers that want a single blank line read the first one.
 */
export function serializeRequestHead(requestLine: string, headers: Iterable<[string, string]>): string {
  return `${requestLine}\r\n${serializeHttp1Headers(headers)}\r\n\r\n`;
}

/** Write the serialized head in one call; rejects with the socket's error. */
export function writeRequestHead(socket: Duplex, head: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(Buffer.from(head, "utf-8"), (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
