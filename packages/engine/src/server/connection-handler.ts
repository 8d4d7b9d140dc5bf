import {
  describeFetchFailure,
  type Fetcher,
  type FetchOutcome,
} from "../fetch/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import { SocketReadError, SocketReader } from "../io/socket-reader.js";
import { type Logger, peerLabel, prefixedLogger } from "../logging/logger.js";
import { writeErrorFrame } from "../protocol/error-frame.js";
import { FramingError } from "../protocol/frame.js";
import { FrameWriteError, writeFrame } from "../protocol/frame-writer.js";
import { readRequestUrl } from "../protocol/request.js";
import { fromString } from "../utils/buffer.js";

export type ConnectionState =
  | "accepted"
  | "reading-request"
  | "fetching"
  | "framing-success"
  | "framing-error"
  | "closed";

/**
 * - `sent`: a success frame was written in full.
 * - `error-sent`: an error frame was written in full.
 * - `aborted`: the connection was closed without a complete frame.
 */
export type ConnectionOutcome = "sent" | "error-sent" | "aborted";

export interface ConnectionReport {
  peer: string;
  outcome: ConnectionOutcome;
  /** Every state the connection passed through, in order. */
  states: ConnectionState[];
  url?: string;
  contentType?: string;
  /** Body length of the frame written, success or error. */
  bodyLength?: number;
  /** Human-readable explanation for error frames and aborts. */
  reason?: string;
}

export interface ConnectionHandlerOptions {
  fetcher: Fetcher;
  ioTimeoutMs: number;
  fetchTimeoutMs: number;
  maxRequestLineBytes: number;
  logger: Logger;
}

/**
 * Serve exactly one request on an accepted connection and close it.
 * Never rejects: every failure is resolved here and reflected in the report.
 */
export async function handleConnection(
  socket: ITcpSocket,
  options: ConnectionHandlerOptions,
): Promise<ConnectionReport> {
  const peer = peerLabel(socket.remoteAddress, socket.remotePort);
  const logger = prefixedLogger(peer, options.logger);
  const report: ConnectionReport = {
    peer,
    outcome: "aborted",
    states: ["accepted"],
  };

  const enter = (state: ConnectionState) => {
    report.states.push(state);
    logger.debug(`state -> ${state}`);
  };

  const sendError = async (message: string) => {
    enter("framing-error");
    report.reason = message;
    const delivered = await writeErrorFrame(socket, message, {
      timeoutMs: options.ioTimeoutMs,
      logger,
    });
    if (delivered) {
      report.outcome = "error-sent";
      report.bodyLength = fromString(message).length;
    }
  };

  // Subscribe before anything else so no early data is missed.
  const reader = new SocketReader(socket);

  try {
    enter("reading-request");
    const request = await readRequestUrl(reader, {
      maxLineBytes: options.maxRequestLineBytes,
      timeoutMs: options.ioTimeoutMs,
    });

    if (request.kind === "invalid") {
      logger.warn(`Rejected request: ${request.message}`);
      await sendError(request.message);
      return report;
    }

    report.url = request.url;
    logger.info(`Fetching URL: ${request.url}`);

    enter("fetching");
    const result = await fetchSafely(options.fetcher, request.url, {
      timeoutMs: options.fetchTimeoutMs,
    });

    if (!result.ok) {
      const message = describeFetchFailure(result.failure);
      logger.warn(message);
      await sendError(message);
      return report;
    }

    enter("framing-success");
    await writeFrame(socket, result.body, result.contentType, {
      timeoutMs: options.ioTimeoutMs,
    });

    report.outcome = "sent";
    report.contentType = result.contentType;
    report.bodyLength = result.body.length;
    logger.info(
      `Sent ${result.body.length} bytes, Content-Type: ${result.contentType}`,
    );
  } catch (err) {
    report.reason = describeAbort(err);
    logAbort(logger, err, report.reason);
  } finally {
    enter("closed");
    try {
      socket.close();
    } catch {
      // Already closed
    }
  }

  return report;
}

async function fetchSafely(
  fetcher: Fetcher,
  url: string,
  options: { timeoutMs: number },
): Promise<FetchOutcome> {
  try {
    return await fetcher.fetch(url, options);
  } catch (err) {
    return {
      ok: false,
      failure: {
        kind: "other",
        message: err instanceof Error ? err.message : String(err),
      },
    };
  }
}

function describeAbort(err: unknown): string {
  if (err instanceof SocketReadError) {
    switch (err.code) {
      case "CONNECTION_CLOSED":
      case "CONNECTION_CLOSED_INCOMPLETE":
        return "connection closed early";
      case "IDLE_TIMEOUT":
      case "READ_TIMEOUT":
        return "connection timed out";
      case "LINE_TOO_LONG":
        return err.message;
    }
  }
  if (err instanceof FrameWriteError && err.code === "WRITE_TIMEOUT") {
    return "connection timed out";
  }
  return err instanceof Error ? err.message : String(err);
}

function logAbort(logger: Logger, err: unknown, reason: string): void {
  if (err instanceof SocketReadError) {
    if (
      err.code === "CONNECTION_CLOSED" ||
      err.code === "CONNECTION_CLOSED_INCOMPLETE"
    ) {
      logger.info(reason);
    } else {
      logger.warn(reason);
    }
    return;
  }

  if (err instanceof FrameWriteError) {
    logger.warn(`error: ${reason}`);
    return;
  }

  if (err instanceof FramingError) {
    logger.error(`framing failed: ${reason}`);
    return;
  }

  logger.error(`error: ${reason}`, err);
}
