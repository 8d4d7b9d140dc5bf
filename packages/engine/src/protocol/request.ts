import { SocketReadError, type SocketReader } from "../io/socket-reader.js";
import { decodeUtf8Strict, trimAsciiWhitespace } from "../utils/buffer.js";
import { MAX_REQUEST_LINE_BYTES } from "./constants.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface ReadRequestOptions {
  maxLineBytes?: number;
  timeoutMs?: number;
}

/**
 * Outcome of reading the request line. `invalid` requests are answered with
 * an error frame; transport failures reject with a SocketReadError instead.
 */
export type RequestParseResult =
  | { kind: "url"; url: string }
  | { kind: "invalid"; message: string };

export const INVALID_ENCODING_MESSAGE = "invalid URL encoding, expected UTF-8";
export const NO_URL_MESSAGE = "no URL received";

/** Only ASCII whitespace is trimmed; other Unicode spaces stay in the URL. */
export function parseRequestLine(line: Uint8Array): RequestParseResult {
  const url = decodeUtf8Strict(trimAsciiWhitespace(line));
  if (url === null) {
    return { kind: "invalid", message: INVALID_ENCODING_MESSAGE };
  }
  if (url.length === 0) {
    return { kind: "invalid", message: NO_URL_MESSAGE };
  }
  return { kind: "url", url };
}

/**
 * Read one newline-terminated URL from the connection. Anything the client
 * sends afterwards is discarded unread.
 */
export async function readRequestUrl(
  reader: SocketReader,
  options?: ReadRequestOptions,
): Promise<RequestParseResult> {
  const maxLineBytes = options?.maxLineBytes ?? MAX_REQUEST_LINE_BYTES;
  const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  let line: Uint8Array;
  try {
    line = await reader.readLine({
      maxBytes: maxLineBytes,
      deadline: Date.now() + timeoutMs,
    });
  } catch (err) {
    if (err instanceof SocketReadError && err.code === "LINE_TOO_LONG") {
      return {
        kind: "invalid",
        message: `request line exceeds ${maxLineBytes} bytes`,
      };
    }
    throw err;
  } finally {
    reader.stopReading();
  }

  return parseRequestLine(line);
}
