/**
 * Pull-based, single-pass cursor over the readable side of a socket.
 * Bytes are buffered only until a caller takes them; nothing is rewound.
 */
import { Buffer } from "node:buffer";
import type { Readable } from "node:stream";

const LF = 0x0a;

export class SocketReader {
  /** Received chunks not yet taken, oldest first */
  private chunks: Buffer[] = [];
  private length = 0;
  private ended = false;
  private error: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly source: Readable) {
    source.on("readable", this.onSignal);
    source.on("end", this.onEnd);
    source.on("close", this.onEnd);
    source.on("error", this.onError);
  }

  /** Bytes received but not yet taken */
  get buffered(): number {
    return this.length;
  }

  /** True once the peer has closed and every buffered byte was taken */
  get exhausted(): boolean {
    return this.ended && this.length === 0;
  }

  /**
   * Read up to and including the next LF, or to end of stream.
   * Returns the line decoded as latin1 with surrounding whitespace trimmed
   * (which also drops a trailing CR). At end of stream the partial line is
   * returned as-is, possibly empty.
   */
  async readLine(): Promise<string> {
    // Chunks before `index` hold no LF and `offset` bytes in total.
    let index = 0;
    let offset = 0;
    while (true) {
      for (; index < this.chunks.length; index++) {
        const chunk = this.chunks[index];
        const lf = chunk.indexOf(LF);
        if (lf !== -1) {
          return this.take(offset + lf + 1).toString("latin1").trim();
        }
        offset += chunk.length;
      }
      if (!(await this.fill())) {
        return this.take(this.length).toString("latin1").trim();
      }
    }
  }

  /**
   * Read exactly `length` bytes.
   * Returns null if the stream ends first; the partial bytes are dropped.
   */
  async readExact(length: number): Promise<Buffer | null> {
    while (this.length < length) {
      if (!(await this.fill())) {
        this.take(this.length);
        return null;
      }
    }
    return this.take(length);
  }

  /** Read every remaining byte until the peer closes. */
  async readToEnd(): Promise<Buffer> {
    while (await this.fill()) {
      // keep buffering
    }
    return this.take(this.length);
  }

  /**
   * Stop reading from the source. Buffered bytes are discarded.
   * The error listener stays: a socket being destroyed can still emit one.
   */
  release(): void {
    this.source.removeListener("readable", this.onSignal);
    this.source.removeListener("end", this.onEnd);
    this.source.removeListener("close", this.onEnd);
    this.chunks = [];
    this.length = 0;
    this.ended = true;
    this.signal();
  }

  /** Remove `length` bytes from the front, copying only when they span chunks. */
  private take(length: number): Buffer {
    if (length >= this.length) {
      const all = this.chunks;
      this.chunks = [];
      this.length = 0;
      return all.length === 1 ? all[0] : Buffer.concat(all);
    }

    const parts: Buffer[] = [];
    let remaining = length;
    while (remaining > 0) {
      const chunk = this.chunks[0];
      if (chunk.length <= remaining) {
        parts.push(chunk);
        this.chunks.shift();
        remaining -= chunk.length;
      } else {
        parts.push(chunk.subarray(0, remaining));
        this.chunks[0] = chunk.subarray(remaining);
        remaining = 0;
      }
    }
    this.length -= length;
    return parts.length === 1 ? parts[0] : Buffer.concat(parts);
  }

  /**
   * Queue the next chunk from the source.
   * Resolves false at end of stream, rejects with the source's error.
   */
  private async fill(): Promise<boolean> {
    while (true) {
      if (this.error) throw this.error;
      const chunk: unknown = this.ended ? null : this.source.read();
      if (chunk !== null) {
        const data = toBuffer(chunk);
        this.chunks.push(data);
        this.length += data.length;
        return true;
      }
      if (this.ended) return false;
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private readonly onSignal = (): void => {
    this.signal();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.signal();
  };

  private readonly onError = (err: Error): void => {
    this.error = err;
    this.signal();
  };
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (typeof chunk === "string") return Buffer.from(chunk, "latin1");
  throw new TypeError(`Unexpected chunk type from socket: ${typeof chunk}`);
}
