/**
 * HTTP/1.1 response parser.
 * State machine that reads the status line and header block off a
 * SocketReader line by line, then decides how the body is framed.
 */
import type { Buffer } from "node:buffer";
import { ResponseError } from "../errors.js";
import { HttpHeaders } from "../utils/headers.js";
import { splitOnce, splitThree } from "../utils/split.js";
import { StatusCode } from "./status.js";
import type { SocketReader } from "./stream-reader.js";

export type ParserState =
  | "status-line"
  | "headers"
  | "body-ready"
  | "body-consuming"
  | "done"
  | "failed";

export interface ResponseHead {
  status: StatusCode;
  headers: HttpHeaders;
  /** How the body is delimited */
  bodyMode: "content-length" | "close";
  /** Declared body size (if bodyMode is "content-length") */
  contentLength: number;
}

const STATUS_RE = /^\d+$/;
const CONTENT_LENGTH_RE = /^\d+$/;

/**
 * Parse a status line such as "HTTP/1.1 200 OK".
 * Needs two spaces; the version and reason phrase are not checked.
 */
export function parseStatusLine(line: string): StatusCode {
  const parts = splitThree(line, " ");
  if (!parts) {
    throw new ResponseError("InvalidStatusLine", `Malformed status line: ${JSON.stringify(line)}`);
  }
  const token = parts[1];
  const code = STATUS_RE.test(token) ? parseInt(token, 10) : NaN;
  if (isNaN(code) || code > 0xffff) {
    throw new ResponseError("InvalidStatusLine", `Invalid status code: ${JSON.stringify(token)}`);
  }
  const status = StatusCode.lookup(code);
  if (!status) {
    throw new ResponseError("InvalidStatusLine", `Unknown status code: ${code}`);
  }
  return status;
}

/** Split "Name: value" at the first colon, trimming both sides. */
export function parseHeaderLine(line: string): [string, string] {
  const parts = splitOnce(line, ":");
  if (!parts) {
    throw new ResponseError("InvalidHeader", `Header line without colon: ${JSON.stringify(line)}`);
  }
  return [parts[0].trim(), parts[1].trim()];
}

/**
 * Content-Length as a non-negative integer, or null when absent or unusable.
 * Unusable values fall back to reading until the connection closes.
 */
export function parseContentLength(headers: HttpHeaders): number | null {
  const value = headers.get("content-length");
  if (value === undefined || !CONTENT_LENGTH_RE.test(value)) return null;
  const length = parseInt(value, 10);
  return Number.isSafeInteger(length) ? length : null;
}

export class ResponseParser {
  private _state: ParserState = "status-line";
  private head: ResponseHead | null = null;

  constructor(private readonly reader: SocketReader) {}

  get state(): ParserState {
    return this._state;
  }

  /**
   * Consume exactly the status line and header block.
   * @throws {ResponseError} InvalidStatusLine or InvalidHeader
   */
  async readHead(): Promise<ResponseHead> {
    if (this._state !== "status-line") {
      throw new Error(`Response head already read (state: ${this._state})`);
    }

    try {
      const status = parseStatusLine(await this.readLineOr("InvalidStatusLine"));
      this._state = "headers";

      const lines: Array<[string, string]> = [];
      while (true) {
        const line = await this.readLineOr("InvalidHeader");
        if (line.length === 0) break;
        lines.push(parseHeaderLine(line));
      }
      const headers = HttpHeaders.fromWire(lines);

      const contentLength = parseContentLength(headers);
      this.head = {
        status,
        headers,
        bodyMode: contentLength === null ? "close" : "content-length",
        contentLength: contentLength ?? 0,
      };
      this._state = "body-ready";
      return this.head;
    } catch (err) {
      this._state = "failed";
      throw err;
    }
  }

  /**
   * Read the whole body as framed by the head.
   * Content-Length bodies must arrive in full; anything short fails.
   * @throws {ResponseError} InvalidBody
   */
  async readBody(): Promise<Buffer> {
    const head = this.head;
    if (this._state !== "body-ready" || !head) {
      throw new ResponseError("InvalidBody", `Body not readable (state: ${this._state})`);
    }
    this._state = "body-consuming";

    try {
      let body: Buffer;
      if (head.bodyMode === "content-length") {
        const exact = await this.reader.readExact(head.contentLength);
        if (!exact) {
          throw new ResponseError(
            "InvalidBody",
            `Connection closed before ${head.contentLength} body bytes were received`,
          );
        }
        body = exact;
      } else {
        body = await this.reader.readToEnd();
      }
      this._state = "done";
      return body;
    } catch (err) {
      this._state = "failed";
      if (err instanceof ResponseError) throw err;
      throw new ResponseError("InvalidBody", "Failed to read response body", { cause: err });
    }
  }

  private async readLineOr(kind: "InvalidStatusLine" | "InvalidHeader"): Promise<string> {
    try {
      return await this.reader.readLine();
    } catch (err) {
      throw new ResponseError(kind, "Connection error while reading response head", {
        cause: err,
      });
    }
  }
}
