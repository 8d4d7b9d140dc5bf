import { describe, expect, it, vi } from "vitest";
import type { FetchOptions, FetchOutcome } from "../fetch/types.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { encodeErrorFrame, encodeFrame } from "../protocol/frame.js";
import { writeFully } from "../protocol/frame-writer.js";
import {
  type InMemorySocketOptions,
  InMemoryTcpSocket,
} from "../testing/in-memory-socket-factory.js";
import { concat, decodeToString, fromString } from "../utils/buffer.js";
import { handleConnection } from "./connection-handler.js";

function stubFetcher(outcome: FetchOutcome | Error) {
  return {
    fetch: vi.fn(async (_url: string, _options: FetchOptions) => {
      if (outcome instanceof Error) {
        throw outcome;
      }
      return outcome;
    }),
  };
}

const page: FetchOutcome = {
  ok: true,
  body: fromString("<html></html>"),
  contentType: "text/html; charset=UTF-8",
};

/** Everything the server sends, resolved once it closes the connection. */
function collect(socket: InMemoryTcpSocket): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  socket.onData((data) => chunks.push(data));
  return new Promise((resolve) => {
    socket.onClose(() => resolve(concat(chunks)));
  });
}

interface ExchangeOptions {
  fetcher?: ReturnType<typeof stubFetcher>;
  socket?: InMemorySocketOptions;
  ioTimeoutMs?: number;
  maxRequestLineBytes?: number;
  logger?: Logger;
  /** Close the client side right after sending. */
  hangUp?: boolean;
  /** Stop sending but keep listening for the reply. */
  halfClose?: boolean;
}

async function exchange(payload: string | Uint8Array, options: ExchangeOptions = {}) {
  const fetcher = options.fetcher ?? stubFetcher(page);
  const [client, server] = InMemoryTcpSocket.createPair(options.socket);
  const response = collect(client);

  const handling = handleConnection(server, {
    fetcher,
    ioTimeoutMs: options.ioTimeoutMs ?? 1000,
    fetchTimeoutMs: 500,
    maxRequestLineBytes: options.maxRequestLineBytes ?? 8192,
    logger: options.logger ?? silentLogger(),
  });

  const bytes = typeof payload === "string" ? fromString(payload) : payload;
  if (bytes.length > 0) {
    await writeFully(client, bytes);
  }
  if (options.hangUp) {
    client.close();
  }
  if (options.halfClose) {
    client.endWrite();
  }

  const report = await handling;
  return { report, response: await response, fetcher, server };
}

describe("handleConnection", () => {
  it("relays a fetched page as one frame", async () => {
    const { report, response, fetcher } = await exchange(
      "http://example.com/\n",
    );

    expect(response).toEqual(
      encodeFrame(fromString("<html></html>"), "text/html; charset=UTF-8"),
    );
    expect(fetcher.fetch).toHaveBeenCalledWith("http://example.com/", {
      timeoutMs: 500,
    });
    expect(report).toEqual({
      peer: "in-memory:2",
      outcome: "sent",
      states: [
        "accepted",
        "reading-request",
        "fetching",
        "framing-success",
        "closed",
      ],
      url: "http://example.com/",
      contentType: "text/html; charset=UTF-8",
      bodyLength: 13,
    });
  });

  it("frames a name-resolution failure as a plain-text error", async () => {
    const { report, response } = await exchange(
      "http://no-such-host.invalid/\n",
      {
        fetcher: stubFetcher({
          ok: false,
          failure: { kind: "transport", reason: "Name or service not known" },
        }),
      },
    );

    expect(decodeToString(response.subarray(0, 10))).toBe("0000000036");
    expect(response).toEqual(
      encodeErrorFrame("URL error: Name or service not known"),
    );
    expect(report.outcome).toBe("error-sent");
    expect(report.bodyLength).toBe(36);
    expect(report.states).toEqual([
      "accepted",
      "reading-request",
      "fetching",
      "framing-error",
      "closed",
    ]);
  });

  it("frames upstream HTTP errors", async () => {
    const { response } = await exchange("http://example.com/missing\n", {
      fetcher: stubFetcher({
        ok: false,
        failure: { kind: "http-status", status: 404, reason: "Not Found" },
      }),
    });

    expect(response).toEqual(encodeErrorFrame("HTTP error 404: Not Found"));
  });

  it("frames unexpected fetcher exceptions", async () => {
    const { report, response } = await exchange("http://example.com/\n", {
      fetcher: stubFetcher(new Error("boom")),
    });

    expect(response).toEqual(encodeErrorFrame("Fetch failed: boom"));
    expect(report.reason).toBe("Fetch failed: boom");
  });

  it("answers a blank request line without fetching", async () => {
    const { report, response, fetcher } = await exchange("   \r\n");

    expect(response).toEqual(encodeErrorFrame("no URL received"));
    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(report.states).toEqual([
      "accepted",
      "reading-request",
      "framing-error",
      "closed",
    ]);
  });

  it("answers a request line that is not UTF-8", async () => {
    const { response, fetcher } = await exchange(
      new Uint8Array([0x68, 0xff, 0xfe, 0x0a]),
    );

    expect(response).toEqual(
      encodeErrorFrame("invalid URL encoding, expected UTF-8"),
    );
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  it("answers an over-long request line", async () => {
    const { report, response } = await exchange("a".repeat(40), {
      maxRequestLineBytes: 32,
    });

    expect(response).toEqual(encodeErrorFrame("request line exceeds 32 bytes"));
    expect(report.outcome).toBe("error-sent");
  });

  it("ignores bytes after the first newline", async () => {
    const { report, fetcher } = await exchange(
      "http://example.com/\nhttp://example.org/\n",
    );

    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(report.url).toBe("http://example.com/");
  });

  it("handles fragmented reads and partial writes", async () => {
    const { report, response } = await exchange("http://example.com/\n", {
      socket: { chunkSize: 3, maxWriteBytes: 5 },
    });

    expect(report.outcome).toBe("sent");
    expect(response).toEqual(
      encodeFrame(fromString("<html></html>"), "text/html; charset=UTF-8"),
    );
  });

  it("closes quietly when the client hangs up mid-line", async () => {
    const { report, response, fetcher } = await exchange("http://exa", {
      hangUp: true,
    });

    expect(response.length).toBe(0);
    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      outcome: "aborted",
      reason: "connection closed early",
      states: ["accepted", "reading-request", "closed"],
    });
  });

  it("answers a client that half-closes after the request line", async () => {
    const { report, response } = await exchange("http://example.com/\n", {
      halfClose: true,
    });

    expect(report.outcome).toBe("sent");
    expect(response).toEqual(
      encodeFrame(fromString("<html></html>"), "text/html; charset=UTF-8"),
    );
  });

  it("aborts when the client half-closes mid-line", async () => {
    const { report, response, fetcher } = await exchange("http://exa", {
      halfClose: true,
    });

    expect(response.length).toBe(0);
    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      outcome: "aborted",
      reason: "connection closed early",
    });
  });

  it("times out a client that never sends", async () => {
    const { report, response, server } = await exchange("", {
      ioTimeoutMs: 20,
    });

    expect(response.length).toBe(0);
    expect(report.outcome).toBe("aborted");
    expect(report.reason).toBe("connection timed out");
    expect(server.isClosed).toBe(true);
  });

  it("aborts without a frame when the body cannot be framed", async () => {
    const huge = new Uint8Array(0);
    Object.defineProperty(huge, "length", { value: 10 ** 10 });

    const { report, response } = await exchange("http://example.com/big\n", {
      fetcher: stubFetcher({
        ok: true,
        body: huge,
        contentType: "application/octet-stream",
      }),
    });

    expect(response.length).toBe(0);
    expect(report.outcome).toBe("aborted");
    expect(report.reason).toBe(
      "Body length 10000000000 does not fit in a 10-digit header",
    );
  });

  it("prefixes log lines with the peer", async () => {
    const logger = { ...silentLogger(), info: vi.fn() };

    await exchange("http://example.com/\n", { logger });

    expect(logger.info).toHaveBeenCalledWith(
      "[in-memory:2] Fetching URL: http://example.com/",
    );
    expect(logger.info).toHaveBeenCalledWith(
      "[in-memory:2] Sent 13 bytes, Content-Type: text/html; charset=UTF-8",
    );
  });
});
