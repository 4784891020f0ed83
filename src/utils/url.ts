/**
 * URI parsing utility.
 * Accepts `[scheme://]host[:port][/path]` only; no query/fragment handling,
 * no userinfo, no IPv6 literals.
 */
import { UriError } from "../errors.js";
import { splitOnce } from "./split.js";

export type Protocol = "http" | "https";

export interface Uri {
  readonly protocol: Protocol;
  readonly hostname: string;
  /** Absent means the protocol's default port */
  readonly port?: number;
  /** Without the leading slash, e.g. "v1/users?page=2" */
  readonly path: string;
}

const DEFAULT_PORTS: Record<Protocol, number> = {
  http: 80,
  https: 443,
};

const PORT_RE = /^\d+$/;

export function defaultPort(protocol: Protocol): number {
  return DEFAULT_PORTS[protocol];
}

function isProtocol(value: string): value is Protocol {
  return value === "http" || value === "https";
}

/**
 * Parse a URI string into its components.
 * @throws {UriError} on empty input, unknown scheme, bad port or empty host
 */
export function parseUri(text: string): Uri {
  if (text.length === 0) {
    throw new UriError("Empty", "URI is empty");
  }

  const [scheme, remainder] = splitOnce(text, "://") ?? ["http", text];
  if (!isProtocol(scheme)) {
    throw new UriError("InvalidProtocol", `Unsupported protocol: ${JSON.stringify(scheme)}`);
  }

  const [hostPort, path] = splitOnce(remainder, "/") ?? [remainder, ""];

  let hostname = hostPort;
  let port: number | undefined;
  const portSplit = splitOnce(hostPort, ":");
  if (portSplit) {
    const [host, portText] = portSplit;
    const value = PORT_RE.test(portText) ? parseInt(portText, 10) : NaN;
    if (isNaN(value) || value > 0xffff) {
      throw new UriError("InvalidPort", `Invalid port: ${JSON.stringify(portText)}`);
    }
    hostname = host;
    port = value;
  }

  if (hostname.length === 0) {
    throw new UriError("InvalidHostname", `Missing hostname in ${JSON.stringify(text)}`);
  }

  return Object.freeze({ protocol: scheme, hostname, port, path });
}

/** The `port` to dial: explicit, or the protocol default. */
export function resolvePort(uri: Uri): number {
  return uri.port ?? defaultPort(uri.protocol);
}

/** "host:port" dial address. */
export function resolveAddress(uri: Uri): string {
  return `${uri.hostname}:${resolvePort(uri)}`;
}

/**
 * Percent-encode `%` and space in the path.
 * `%` goes first so the `%` of `%20` is not encoded again.
 */
export function encodePath(uri: Uri): string {
  return uri.path.replaceAll("%", "%25").replaceAll(" ", "%20");
}
