/**
 * Response status codes. The set is closed: only codes listed in
 * status-codes.json can be constructed.
 */
import reasonPhrases from "./status-codes.json" with { type: "json" };

const REASONS: ReadonlyMap<number, string> = new Map(
  Object.entries(reasonPhrases).map(([code, reason]): [number, string] => [Number(code), reason]),
);

export class StatusCode {
  private static readonly cache = new Map<number, StatusCode>();

  private constructor(
    readonly code: number,
    readonly reason: string,
  ) {}

  /** Look up a known code, or null. */
  static lookup(code: number): StatusCode | null {
    const cached = StatusCode.cache.get(code);
    if (cached) return cached;
    const reason = REASONS.get(code);
    if (reason === undefined) return null;
    const status = new StatusCode(code, reason);
    StatusCode.cache.set(code, status);
    return status;
  }

  /** @throws {RangeError} for a code outside the known set */
  static from(code: number): StatusCode {
    const status = StatusCode.lookup(code);
    if (!status) {
      throw new RangeError(`Unknown status code: ${code}`);
    }
    return status;
  }

  /** Every known code, ascending. */
  static all(): StatusCode[] {
    return [...REASONS.keys()].sort((a, b) => a - b).map(code => StatusCode.from(code));
  }

  isInformational(): boolean {
    return this.code >= 100 && this.code < 200;
  }

  isSuccess(): boolean {
    return this.code >= 200 && this.code < 300;
  }

  isRedirection(): boolean {
    return this.code >= 300 && this.code < 400;
  }

  isClientError(): boolean {
    return this.code >= 400 && this.code < 500;
  }

  isServerError(): boolean {
    return this.code >= 500 && this.code < 600;
  }

  /** "404 Not Found" */
  toString(): string {
    return `${this.code} ${this.reason}`;
  }
}
