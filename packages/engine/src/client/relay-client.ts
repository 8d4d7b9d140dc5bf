import { defaultClientConfig } from "../config/relay-config.js";
import type { ISocketFactory, ITcpSocket } from "../interfaces/socket.js";
import { SocketReadError, SocketReader } from "../io/socket-reader.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import {
  CONTENT_TYPE_HEADER_SIZE,
  LENGTH_HEADER_SIZE,
} from "../protocol/constants.js";
import { parseContentTypeHeader, parseLengthHeader } from "../protocol/frame.js";
import { FrameWriteError, writeFully } from "../protocol/frame-writer.js";
import { fromString } from "../utils/buffer.js";

export type RelayClientErrorCode =
  | "CONNECT_FAILED"
  | "SEND_FAILED"
  | "CONNECTION_ERROR"
  | "TIMEOUT"
  | "INCOMPLETE_LENGTH_HEADER"
  | "INVALID_LENGTH_HEADER"
  | "INCOMPLETE_CONTENT_TYPE_HEADER"
  | "BODY_TRUNCATED";

export class RelayClientError extends Error {
  constructor(
    readonly code: RelayClientErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RelayClientError";
  }
}

export interface RelayResponse {
  body: Uint8Array;
  contentType: string;
}

export interface RelayClientOptions {
  socketFactory: ISocketFactory;
  /** Overall budget for the whole exchange. Default: 30000ms */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Sends one URL to a relay server and decodes the framed reply. Each call
 * uses its own connection.
 */
export class RelayClient {
  private socketFactory: ISocketFactory;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: RelayClientOptions) {
    this.socketFactory = options.socketFactory;
    this.timeoutMs = options.timeoutMs ?? defaultClientConfig().timeoutMs;
    this.logger = options.logger ?? basicLogger();
  }

  async fetch(host: string, port: number, url: string): Promise<RelayResponse> {
    const deadline = Date.now() + this.timeoutMs;
    const socket = await this.connect(host, port, deadline);

    try {
      // Subscribe before sending so no part of the reply is missed.
      const reader = new SocketReader(socket);
      await this.sendRequest(socket, url, deadline);
      return await readFrame(reader, deadline);
    } catch (err) {
      if (err instanceof SocketReadError) {
        throw new RelayClientError(
          "TIMEOUT",
          `timed out waiting for response: ${err.message}`,
          { cause: err },
        );
      }
      if (err instanceof RelayClientError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RelayClientError("CONNECTION_ERROR", reason, { cause: err });
    } finally {
      try {
        socket.close();
      } catch {
        // Already closed
      }
    }
  }

  private async connect(
    host: string,
    port: number,
    deadline: number,
  ): Promise<ITcpSocket> {
    this.logger.debug(`Connecting to ${host}:${port}`);
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new RelayClientError(
              "TIMEOUT",
              `timed out connecting to ${host}:${port}`,
            ),
          ),
        Math.max(0, deadline - Date.now()),
      );
    });

    const connecting = this.socketFactory.createTcpSocket({ host, port });
    try {
      return await Promise.race([connecting, timeout]);
    } catch (err) {
      if (err instanceof RelayClientError) {
        // A connection that completes after the timeout must still be released.
        void connecting.then(
          (late) => late.close(),
          (lateErr: unknown) =>
            this.logger.debug("Abandoned connection failed:", lateErr),
        );
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RelayClientError(
        "CONNECT_FAILED",
        `could not connect to ${host}:${port}: ${reason}`,
        { cause: err },
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private async sendRequest(
    socket: ITcpSocket,
    url: string,
    deadline: number,
  ): Promise<void> {
    try {
      await writeFully(socket, fromString(`${url}\n`), {
        timeoutMs: Math.max(0, deadline - Date.now()),
      });
    } catch (err) {
      if (err instanceof FrameWriteError && err.code === "WRITE_TIMEOUT") {
        throw new RelayClientError("TIMEOUT", "timed out sending request", {
          cause: err,
        });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new RelayClientError(
        "SEND_FAILED",
        `could not send request: ${reason}`,
        { cause: err },
      );
    }
  }
}

/**
 * Decode one response frame: length header, content-type header, body.
 * Short reads are reported rather than returned as a truncated body.
 */
export async function readFrame(
  reader: SocketReader,
  deadline: number,
): Promise<RelayResponse> {
  const lengthHeader = await reader.readExactly(LENGTH_HEADER_SIZE, {
    deadline,
  });
  if (lengthHeader.length < LENGTH_HEADER_SIZE) {
    throw new RelayClientError(
      "INCOMPLETE_LENGTH_HEADER",
      "incomplete length header",
    );
  }

  let bodyLength: number;
  try {
    bodyLength = parseLengthHeader(lengthHeader);
  } catch (err) {
    throw new RelayClientError(
      "INVALID_LENGTH_HEADER",
      "invalid length header",
      { cause: err },
    );
  }

  const contentTypeHeader = await reader.readExactly(
    CONTENT_TYPE_HEADER_SIZE,
    { deadline },
  );
  if (contentTypeHeader.length < CONTENT_TYPE_HEADER_SIZE) {
    throw new RelayClientError(
      "INCOMPLETE_CONTENT_TYPE_HEADER",
      "incomplete content-type header",
    );
  }
  const contentType = parseContentTypeHeader(contentTypeHeader);

  const body = await reader.readExactly(bodyLength, { deadline });
  if (body.length < bodyLength) {
    throw new RelayClientError(
      "BODY_TRUNCATED",
      `expected ${bodyLength} bytes, got ${body.length} bytes`,
    );
  }

  return { body, contentType };
}
