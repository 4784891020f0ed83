/**
 * HTTP client: resolves the address, opens a transport per request,
 * writes the request head and hands the socket to the response parser.
 *
 * One connection per send, no pooling. The returned response owns the
 * socket and closes it once the body has been read.
 */
import type { Duplex } from "node:stream";
import { HttpError, ResponseError, UriError } from "./errors.js";
import { HttpResponse } from "./http1/response.js";
import { SocketReader } from "./http1/stream-reader.js";
import {
  createRequest,
  getRequestLine,
  serializeRequestHead,
  writeRequestHead,
  type HttpMethod,
  type HttpRequest,
  type RequestInit,
} from "./http1/request.js";
import { createSocket, type SocketFactory } from "./socket/tls.js";
import { defaultHeaders, HttpHeaders, type HeaderInput } from "./utils/headers.js";
import { resolveAddress, resolvePort, type Protocol, type Uri } from "./utils/url.js";

export interface ClientOptions {
  /** Connect timeout in ms (default: none). Header and body reads are not bounded. */
  timeout?: number;
  /** Headers merged over the built-in defaults */
  headers?: HeaderInput;
  /** Transport factory (default: node:net / node:tls) */
  connect?: SocketFactory;
}

export interface RequestOptions extends RequestInit {
  method?: HttpMethod;
}

/** What a scheme handler needs from the client. Read-only per send. */
interface SendContext {
  headers: HttpHeaders;
  timeout?: number;
  connect: SocketFactory;
}

type SchemeHandler = (context: SendContext, request: HttpRequest) => Promise<HttpResponse>;

const SCHEME_HANDLERS = {
  http: (context, request) => exchange(context, request, false),
  https: (context, request) => exchange(context, request, true),
} satisfies Record<Protocol, SchemeHandler>;

export class HttpClient {
  readonly timeout?: number;
  /** Defaults sent with every request; per-request headers win on conflict */
  readonly headers: HttpHeaders;
  private readonly connect: SocketFactory;

  constructor(options: ClientOptions = {}) {
    this.timeout = options.timeout;
    this.headers = defaultHeaders().combine(HttpHeaders.from(options.headers));
    this.connect = options.connect ?? createSocket;
  }

  /**
   * Build a request. Nothing is sent until `send`.
   * @throws {UriError} if `uri` does not parse
   */
  request(method: HttpMethod, uri: string | Uri, init?: RequestInit): HttpRequest {
    return createRequest(method, uri, init);
  }

  /**
   * Send a request and resolve once the status line and headers are parsed.
   * The body is left on the connection for the caller to read.
   * @throws {HttpError}
   */
  send(request: HttpRequest): Promise<HttpResponse> {
    const handler = SCHEME_HANDLERS[request.uri.protocol];
    return handler({ headers: this.headers, timeout: this.timeout, connect: this.connect }, request);
  }
}

/**
 * Send a request through a fresh client with default settings.
 * @example
 * ```ts
 * const response = await request("http://example.com/status", { method: "GET" });
 * if (response.ok) console.log(await response.text());
 * ```
 */
export async function request(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
  const client = new HttpClient();
  let req: HttpRequest;
  try {
    req = client.request(options.method ?? "GET", url, options);
  } catch (err) {
    if (err instanceof UriError) {
      throw new HttpError("InvalidUri", `Invalid URI ${JSON.stringify(url)}: ${err.message}`, {
        cause: err,
      });
    }
    throw err;
  }
  return client.send(req);
}

async function exchange(
  context: SendContext,
  request: HttpRequest,
  tls: boolean,
): Promise<HttpResponse> {
  const address = resolveAddress(request.uri);
  const timeout = request.timeout ?? context.timeout;
  const requestLine = getRequestLine(request);
  const head = serializeRequestHead(requestLine, context.headers.combine(request.headers));

  let socket: Duplex;
  try {
    socket = await context.connect({
      hostname: request.uri.hostname,
      port: resolvePort(request.uri),
      tls,
      timeout,
    });
  } catch (err) {
    if (isLookupFailure(err)) {
      throw new HttpError("InvalidUri", `Could not resolve ${address}`, { cause: err });
    }
    throw new HttpError("ConnectionFailed", `Failed to connect to ${address}`, { cause: err });
  }

  // The reader's error listener must be on the socket before the write.
  const reader = new SocketReader(socket);
  console.debug(`[client] ${address} > ${requestLine}`);

  try {
    await writeRequestHead(socket, head);
  } catch (err) {
    reader.release();
    socket.destroy();
    throw new HttpError("WriteFailed", `Failed to write request to ${address}`, { cause: err });
  }

  try {
    return await HttpResponse.read(socket, reader);
  } catch (err) {
    if (err instanceof ResponseError) {
      throw new HttpError("InvalidResponse", `Invalid response from ${address}: ${err.message}`, {
        cause: err,
      });
    }
    throw new HttpError("UnknownError", `Request to ${address} failed`, { cause: err });
  }
}

function isLookupFailure(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOTFOUND" || err.code === "EAI_AGAIN")
  );
}
