/**
 * TCP/TLS connection factory.
 * Opens a node:net socket for plain HTTP and a node:tls socket for HTTPS;
 * the TLS handshake is left entirely to Node.
 */
import { connect as connectTcp, isIP, type Socket } from "node:net";
import { connect as connectTls } from "node:tls";
import type { Duplex } from "node:stream";

/** Options for opening a transport connection */
export interface SocketOptions {
  hostname: string;
  port: number;
  tls: boolean;
  /** Bounds the connect (and TLS handshake) step only, in ms */
  timeout?: number;
}

/** Opens a connected byte-duplex. Injectable for tests and custom transports. */
export type SocketFactory = (options: SocketOptions) => Promise<Duplex>;

/**
 * Open a connection and wait until it is usable.
 * With `tls`, SNI is sent for hostnames (not for IP literals).
 */
export function createSocket(options: SocketOptions): Promise<Socket> {
  const { hostname, port, timeout } = options;
  console.debug(`[socket] connect(${hostname}:${port} tls=${options.tls})`);

  return new Promise((resolve, reject) => {
    let connectTimer: ReturnType<typeof setTimeout> | undefined;

    const socket: Socket = options.tls
      ? connectTls({
          host: hostname,
          port,
          servername: isIP(hostname) === 0 ? hostname : undefined,
        })
      : connectTcp({ host: hostname, port });

    const readyEvent = options.tls ? "secureConnect" : "connect";

    const cleanup = () => {
      clearTimeout(connectTimer);
      socket.removeListener(readyEvent, onReady);
      socket.removeListener("error", onError);
    };

    const onReady = () => {
      cleanup();
      resolve(socket);
    };

    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(err);
    };

    socket.once(readyEvent, onReady);
    socket.once("error", onError);

    if (typeof timeout === "number" && timeout > 0 && timeout < Infinity) {
      connectTimer = setTimeout(() => {
        onError(new Error(`TCP connect timeout after ${timeout}ms (${hostname}:${port})`));
      }, timeout);
    }
  });
}
