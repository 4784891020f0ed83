import { describe, it, expect } from "vitest";
import { ResponseError } from "../../../src/errors.js";
import {
  ResponseParser,
  parseContentLength,
  parseHeaderLine,
  parseStatusLine,
} from "../../../src/http1/parser.js";
import { SocketReader } from "../../../src/http1/stream-reader.js";
import { HttpHeaders } from "../../../src/utils/headers.js";
import { createMockSocket } from "../../helpers/mock-socket.js";

async function expectResponseError(promise: Promise<unknown>, kind: ResponseError["kind"]) {
  const err = await promise.then(
    () => null,
    (e: unknown) => e,
  );
  expect(err).toBeInstanceOf(ResponseError);
  expect((err as ResponseError).kind).toBe(kind);
}

function parserFor(raw: string, close = true) {
  const mock = createMockSocket();
  mock.pushResponse(raw);
  if (close) mock.end();
  return { parser: new ResponseParser(new SocketReader(mock.socket)), ...mock };
}

describe("parseStatusLine", () => {
  it("should parse a standard status line", () => {
    expect(parseStatusLine("HTTP/1.1 200 OK").code).toBe(200);
    expect(parseStatusLine("HTTP/1.0 404 Not Found").code).toBe(404);
  });

  it("should ignore the reason phrase, even a wrong one", () => {
    expect(parseStatusLine("HTTP/1.1 503 Totally Fine").reason).toBe("Service Unavailable");
  });

  it("should accept an empty reason phrase when both spaces are present", () => {
    expect(parseStatusLine("HTTP/1.1 204 ").code).toBe(204);
  });

  it("should reject an unknown status code", () => {
    expect(() => parseStatusLine("HTTP/1.1 999 Bogus")).toThrow(ResponseError);
    expect(() => parseStatusLine("HTTP/1.1 999 Bogus")).toThrow("Unknown status code: 999");
  });

  it("should reject lines with fewer than three parts", () => {
    expect(() => parseStatusLine("HTTP/1.1")).toThrow(/Malformed status line/);
    expect(() => parseStatusLine("HTTP/1.1 200")).toThrow(/Malformed status line/);
    expect(() => parseStatusLine("")).toThrow(/Malformed status line/);
  });

  it("should reject non-numeric or oversized status tokens", () => {
    expect(() => parseStatusLine("HTTP/1.1 abc OK")).toThrow(/Invalid status code/);
    expect(() => parseStatusLine("HTTP/1.1 -200 OK")).toThrow(/Invalid status code/);
    expect(() => parseStatusLine("HTTP/1.1 70000 OK")).toThrow(/Invalid status code/);
  });

  it("should report InvalidStatusLine as the kind", () => {
    try {
      parseStatusLine("garbage");
      expect.unreachable();
    } catch (err) {
      expect((err as ResponseError).kind).toBe("InvalidStatusLine");
    }
  });
});

describe("parseHeaderLine", () => {
  it("should split at the first colon and trim", () => {
    expect(parseHeaderLine("Content-Type :  text/plain ")).toEqual(["Content-Type", "text/plain"]);
  });

  it("should keep later colons in the value", () => {
    expect(parseHeaderLine("Location: http://example.com:8080/")).toEqual([
      "Location",
      "http://example.com:8080/",
    ]);
  });

  it("should allow an empty value", () => {
    expect(parseHeaderLine("X-Empty:")).toEqual(["X-Empty", ""]);
  });

  it("should reject a line without a colon", () => {
    expect(() => parseHeaderLine("not a header")).toThrow(/without colon/);
  });
});

describe("parseContentLength", () => {
  it("should parse a non-negative integer", () => {
    expect(parseContentLength(HttpHeaders.from({ "Content-Length": "0" }))).toBe(0);
    expect(parseContentLength(HttpHeaders.from({ "content-length": "1024" }))).toBe(1024);
  });

  it("should return null for absent or unusable values", () => {
    expect(parseContentLength(new HttpHeaders())).toBeNull();
    expect(parseContentLength(HttpHeaders.from({ "Content-Length": "-1" }))).toBeNull();
    expect(parseContentLength(HttpHeaders.from({ "Content-Length": "12abc" }))).toBeNull();
    expect(parseContentLength(HttpHeaders.from({ "Content-Length": "1.5" }))).toBeNull();
  });
});

describe("ResponseParser", () => {
  it("should parse status and headers and stop at the blank line", async () => {
    const { parser } = parserFor(
      "HTTP/1.1 200 OK\r\nContent-Type: application/json\r\nContent-Length: 13\r\n\r\n" +
        '{"hello":"ok"}',
    );

    const head = await parser.readHead();

    expect(head.status.code).toBe(200);
    expect(head.headers.get("content-type")).toBe("application/json");
    expect(head.bodyMode).toBe("content-length");
    expect(head.contentLength).toBe(13);
    expect(parser.state).toBe("body-ready");
  });

  it("should accept bare LF line endings", async () => {
    const { parser } = parserFor("HTTP/1.1 404 Not Found\nX-A: 1\n\n");
    const head = await parser.readHead();
    expect(head.status.code).toBe(404);
    expect(head.headers.get("x-a")).toBe("1");
  });

  it("should keep the last of duplicate headers", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\nX-Dup: first\r\nx-dup: second\r\n\r\n");
    const head = await parser.readHead();
    expect(head.headers.get("X-Dup")).toBe("second");
    expect(head.headers.size).toBe(1);
  });

  it("should use close framing without Content-Length", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\n\r\n");
    const head = await parser.readHead();
    expect(head.bodyMode).toBe("close");
    expect(head.contentLength).toBe(0);
  });

  it("should use close framing with an unparsable Content-Length", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Length: lots\r\n\r\nabc");
    const head = await parser.readHead();
    expect(head.bodyMode).toBe("close");
    expect((await parser.readBody()).toString()).toBe("abc");
  });

  it("should not treat chunked encoding specially", async () => {
    const { parser } = parserFor(
      "HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\n\r\n5\r\nhello\r\n0\r\n\r\n",
    );
    const head = await parser.readHead();
    expect(head.bodyMode).toBe("close");
    expect((await parser.readBody()).toString()).toBe("5\r\nhello\r\n0\r\n\r\n");
  });

  it("should end the header block at end of stream", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\nX-Last: yes");
    const head = await parser.readHead();
    expect(head.headers.get("x-last")).toBe("yes");
    expect((await parser.readBody()).length).toBe(0);
  });

  it("should fail with InvalidStatusLine on an empty stream", async () => {
    const { parser } = parserFor("");
    await expectResponseError(parser.readHead(), "InvalidStatusLine");
    expect(parser.state).toBe("failed");
  });

  it("should fail with InvalidStatusLine on an unknown code", async () => {
    const { parser } = parserFor("HTTP/1.1 999 Bogus\r\n\r\n");
    await expectResponseError(parser.readHead(), "InvalidStatusLine");
  });

  it("should fail with InvalidStatusLine on a one-token line", async () => {
    const { parser } = parserFor("HTTP/1.1\r\n\r\n");
    await expectResponseError(parser.readHead(), "InvalidStatusLine");
  });

  it("should fail with InvalidHeader on a line without colon", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\nBroken header\r\n\r\n");
    await expectResponseError(parser.readHead(), "InvalidHeader");
    expect(parser.state).toBe("failed");
  });

  it("should accept any header line that has a colon", async () => {
    const { parser } = parserFor(
      "HTTP/1.1 200 OK\r\nX Custom: 1\r\n: empty-name\r\nX-Info: a\0b\r\n\r\n",
    );

    const head = await parser.readHead();

    expect(head.headers.get("x custom")).toBe("1");
    expect(head.headers.get("")).toBe("empty-name");
    expect(head.headers.get("X-Info")).toBe("a\0b");
    expect(parser.state).toBe("body-ready");
  });

  it("should fail with InvalidHeader when the connection errors mid-head", async () => {
    const { parser, socket } = parserFor("HTTP/1.1 200 OK\r\nX-A: 1\r\n", false);
    const head = parser.readHead();
    await new Promise(resolve => setTimeout(resolve, 5));
    socket.destroy(new Error("connection reset"));
    await expectResponseError(head, "InvalidHeader");
  });

  it("should refuse to read the head twice", async () => {
    const { parser } = parserFor("HTTP/1.1 200 OK\r\n\r\n");
    await parser.readHead();
    await expect(parser.readHead()).rejects.toThrow(/already read/);
  });

  describe("readBody", () => {
    it("should return exactly Content-Length bytes", async () => {
      const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello");
      await parser.readHead();
      expect((await parser.readBody()).toString()).toBe("hello");
      expect(parser.state).toBe("done");
    });

    it("should not read past Content-Length", async () => {
      const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello world");
      await parser.readHead();
      expect((await parser.readBody()).toString()).toBe("hello");
    });

    it("should return an empty body for Content-Length: 0 without waiting for close", async () => {
      const { parser } = parserFor("HTTP/1.1 204 No Content\r\nContent-Length: 0\r\n\r\n", false);
      await parser.readHead();
      expect((await parser.readBody()).length).toBe(0);
    });

    it("should wait for body bytes that arrive later", async () => {
      const { parser, pushResponse } = parserFor(
        "HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\nhel",
        false,
      );
      await parser.readHead();
      const body = parser.readBody();
      await new Promise(resolve => setTimeout(resolve, 5));
      pushResponse("lo world");
      expect((await body).toString()).toBe("hello worl");
    });

    it("should fail with InvalidBody when the connection closes early", async () => {
      const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nabc");
      await parser.readHead();
      await expectResponseError(parser.readBody(), "InvalidBody");
      expect(parser.state).toBe("failed");
    });

    it("should read everything until close without Content-Length", async () => {
      const { parser, pushResponse, end } = parserFor("HTTP/1.1 200 OK\r\n\r\nfirst,", false);
      await parser.readHead();
      const body = parser.readBody();
      pushResponse("second,");
      await new Promise(resolve => setTimeout(resolve, 5));
      pushResponse("third");
      end();
      expect((await body).toString()).toBe("first,second,third");
    });

    it("should wrap a connection error as InvalidBody", async () => {
      const { parser, socket } = parserFor("HTTP/1.1 200 OK\r\n\r\npartial", false);
      await parser.readHead();
      const body = parser.readBody();
      await new Promise(resolve => setTimeout(resolve, 5));
      socket.destroy(new Error("connection reset"));
      await expectResponseError(body, "InvalidBody");
    });

    it("should refuse to read the body before the head", async () => {
      const { parser } = parserFor("HTTP/1.1 200 OK\r\n\r\n");
      await expectResponseError(parser.readBody(), "InvalidBody");
    });

    it("should refuse a second body read", async () => {
      const { parser } = parserFor("HTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok");
      await parser.readHead();
      await parser.readBody();
      await expectResponseError(parser.readBody(), "InvalidBody");
    });
  });
});
