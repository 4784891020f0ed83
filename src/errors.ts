/**
 * Error types for URI parsing, response decoding and request sending.
 * Each carries a `kind` so callers can branch without matching on messages.
 */

export type UriErrorKind = "Empty" | "InvalidProtocol" | "InvalidHostname" | "InvalidPort";

export type ResponseErrorKind = "InvalidStatusLine" | "InvalidHeader" | "InvalidBody";

export type HttpErrorKind =
  | "InvalidUri"
  | "ConnectionFailed"
  | "WriteFailed"
  | "InvalidResponse"
  | "UnknownError";

/** Raised by `parseUri` when the text is not `[scheme://]host[:port][/path]`. */
export class UriError extends Error {
  readonly kind: UriErrorKind;

  constructor(kind: UriErrorKind, message: string) {
    super(message);
    this.name = "UriError";
    this.kind = kind;
    Object.setPrototypeOf(this, UriError.prototype);
  }
}

/**
 * Raised while decoding the response byte stream.
 * The stream position is lost after one of these; the connection is unusable.
 */
export class ResponseError extends Error {
  readonly kind: ResponseErrorKind;

  constructor(kind: ResponseErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResponseError";
    this.kind = kind;
    Object.setPrototypeOf(this, ResponseError.prototype);
  }
}

/** Raised by `HttpClient.send`. The lower-level error is kept as `cause`. */
export class HttpError extends Error {
  readonly kind: HttpErrorKind;
  /** Set when `kind` is "InvalidResponse" */
  readonly responseErrorKind?: ResponseErrorKind;

  constructor(kind: HttpErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HttpError";
    this.kind = kind;
    if (options?.cause instanceof ResponseError) {
      this.responseErrorKind = options.cause.kind;
    }
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}
