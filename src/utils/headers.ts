/**
 * Header set with case-insensitive keys, plus HTTP/1.1 validation helpers.
 */

const INVALID_HEADER_CHAR_RE = /[\r\n\0]/;

// RFC 7230 3.2.6. Field Value Components: token = 1*tchar
// tchar = "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." / "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

/**
 * Validate header name against RFC 7230 token characters.
 */
export function validateHeaderName(name: string): void {
  if (!TOKEN_RE.test(name)) {
    throw new Error(`Invalid header name: ${JSON.stringify(name)} contains invalid characters`);
  }
}

/**
 * Validate header value against CR/LF/NUL injection.
 */
export function validateHeaderValue(name: string, value: string): void {
  if (INVALID_HEADER_CHAR_RE.test(value)) {
    throw new Error(`Invalid header value for "${name}": contains CR/LF/NUL`);
  }
}

/**
 * Validate HTTP method to prevent CRLF injection and ensure valid token characters.
 */
export function validateMethod(method: string): void {
  if (!TOKEN_RE.test(method)) {
    throw new Error(`Invalid method: ${JSON.stringify(method)} contains invalid characters`);
  }
}

// RFC 7230 3.1.1 request-target cannot contain whitespace (SP/HTAB) or CR/LF
const INVALID_PATH_RE = /[\r\n\s]/;

/**
 * Validate HTTP path to prevent Request Splitting and ensure valid request-target.
 */
export function validatePath(path: string): void {
  if (INVALID_PATH_RE.test(path)) {
    throw new Error(
      `Invalid path: ${JSON.stringify(path)} contains whitespace or control characters`,
    );
  }
}

/** Headers input accepted by the public API. */
export type HeaderInput = Record<string, string> | Array<[string, string]> | HttpHeaders;

/**
 * Header name → value map. Lookups ignore case; serialization uses the
 * spelling of the most recent write. One value per name, last write wins.
 */
export class HttpHeaders implements Iterable<[string, string]> {
  private readonly data = new Map<string, [string, string]>();

  /** Build a set from a record, a list of pairs or another set (copied). */
  static from(input?: HeaderInput): HttpHeaders {
    const headers = new HttpHeaders();
    if (!input) return headers;
    const entries = input instanceof HttpHeaders || Array.isArray(input) ? input : Object.entries(input);
    for (const [name, value] of entries) {
      headers.insert(name, value);
    }
    return headers;
  }

  /**
   * Build a set from header lines decoded off the wire. Names and values
   * are stored as received; validation applies only when they are written.
   */
  static fromWire(pairs: Iterable<[string, string]>): HttpHeaders {
    const headers = new HttpHeaders();
    for (const [name, value] of pairs) {
      headers.data.set(name.toLowerCase(), [name, value]);
    }
    return headers;
  }

  /**
   * Merge two sets into a new one. `overlay` wins on conflicting names;
   * neither input is modified.
   */
  static combine(base: HttpHeaders, overlay: HttpHeaders): HttpHeaders {
    const result = base.clone();
    for (const [name, value] of overlay) {
      result.insert(name, value);
    }
    return result;
  }

  insert(name: string, value: string): void {
    validateHeaderName(name);
    validateHeaderValue(name, value);
    this.data.set(name.toLowerCase(), [name, value]);
  }

  get(name: string): string | undefined {
    return this.data.get(name.toLowerCase())?.[1];
  }

  has(name: string): boolean {
    return this.data.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    return this.data.delete(name.toLowerCase());
  }

  setHost(host: string): void {
    this.insert("Host", host);
  }

  setUserAgent(userAgent: string): void {
    this.insert("User-Agent", userAgent);
  }

  setAccept(accept: string): void {
    this.insert("Accept", accept);
  }

  setAcceptLanguage(language: string): void {
    this.insert("Accept-Language", language);
  }

  setAcceptEncoding(encoding: string): void {
    this.insert("Accept-Encoding", encoding);
  }

  combine(overlay: HttpHeaders): HttpHeaders {
    return HttpHeaders.combine(this, overlay);
  }

  clone(): HttpHeaders {
    const copy = new HttpHeaders();
    for (const [key, entry] of this.data) {
      copy.data.set(key, [entry[0], entry[1]]);
    }
    return copy;
  }

  get size(): number {
    return this.data.size;
  }

  /** Pairs in insertion order of their names. Callers should not rely on the order. */
  *entries(): IterableIterator<[string, string]> {
    for (const [name, value] of this.data.values()) {
      yield [name, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  /** Plain object keyed by the serialized names. */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.entries());
  }
}

/**
 * Baseline client identification headers. A new set on every call, so
 * clients never share a mutable default table.
 * `host` is a placeholder; each request overrides it with its own hostname.
 */
export function defaultHeaders(): HttpHeaders {
  return HttpHeaders.from({
    "User-Agent": "wire-client/0.1",
    Accept: "*/*",
    "Accept-Language": "en-US",
    "Accept-Encoding": "identity",
    Connection: "close",
    "Upgrade-Insecure-Requests": "1",
    "Sec-Fetch-Dest": "document",
    Host: "localhost",
  });
}

/**
 * Serialize headers into HTTP/1.1 format: "Key: Value\r\n"
 * Validates against header injection (CR/LF/NUL).
 */
export function serializeHttp1Headers(headers: Iterable<[string, string]>): string {
  let result = "";
  for (const [key, value] of headers) {
    validateHeaderName(key);
    validateHeaderValue(key, value);
    result += `${key}: ${value}\r\n`;
  }
  return result;
}
