/**
 * Response handle returned by the client. The status and headers are
 * already parsed; the body stays on the socket until one of the body
 * accessors pulls it, and can be pulled only once.
 */
import type { Duplex } from "node:stream";
import { ResponseError } from "../errors.js";
import type { HttpHeaders } from "../utils/headers.js";
import { ResponseParser, type ResponseHead } from "./parser.js";
import type { StatusCode } from "./status.js";
import { SocketReader } from "./stream-reader.js";

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export class HttpResponse {
  readonly status: StatusCode;
  readonly headers: HttpHeaders;
  readonly protocol = "http/1.1";

  private bodyConsumed = false;
  private closed = false;

  private constructor(
    head: ResponseHead,
    private readonly parser: ResponseParser,
    private readonly reader: SocketReader,
    private readonly socket: Duplex,
  ) {
    this.status = head.status;
    this.headers = head.headers;
  }

  /**
   * Read the status line and headers from `socket` and return a response
   * whose body is not yet read. On failure the socket is destroyed.
   * Pass `reader` when one is already attached to the socket.
   * @throws {ResponseError} InvalidStatusLine or InvalidHeader
   */
  static async read(socket: Duplex, reader = new SocketReader(socket)): Promise<HttpResponse> {
    const parser = new ResponseParser(reader);
    try {
      const head = await parser.readHead();
      console.debug(
        `[http1] head status=${head.status.code} bodyMode=${head.bodyMode} contentLength=${head.contentLength}`,
      );
      return new HttpResponse(head, parser, reader, socket);
    } catch (err) {
      reader.release();
      socket.destroy();
      throw err;
    }
  }

  get ok(): boolean {
    return this.status.isSuccess();
  }

  /** Whether the body has been taken (or the response closed) */
  get bodyUsed(): boolean {
    return this.bodyConsumed || this.closed;
  }

  /**
   * Read the whole body. Closes the connection afterwards.
   * @throws {ResponseError} InvalidBody if the body is short, unreadable or already used
   */
  async body(): Promise<Uint8Array> {
    if (this.bodyUsed) {
      throw new ResponseError("InvalidBody", "Body already consumed");
    }
    this.bodyConsumed = true;
    try {
      return await this.parser.readBody();
    } finally {
      this.close();
    }
  }

  /** Read the body as strict UTF-8. */
  async text(): Promise<string> {
    const bytes = await this.body();
    try {
      return utf8Decoder.decode(bytes);
    } catch (err) {
      throw new ResponseError("InvalidBody", "Body is not valid UTF-8", { cause: err });
    }
  }

  /** Read the body as JSON. */
  async json(): Promise<unknown> {
    const text = await this.text();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ResponseError("InvalidBody", "Body is not valid JSON", { cause: err });
    }
  }

  /** Drop the connection. Any unread body is discarded. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.reader.release();
    this.socket.destroy();
  }
}
