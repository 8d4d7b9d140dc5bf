import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";
import { ERROR_CONTENT_TYPE } from "./constants.js";
import { type WriteOptions, writeFrame } from "./frame-writer.js";

export interface ErrorFrameOptions extends WriteOptions {
  logger?: Logger;
}

/**
 * Send a diagnostic message as a plain-text frame. The connection is already
 * failing when this runs, so write errors are logged and reported as `false`
 * rather than thrown.
 */
export async function writeErrorFrame(
  socket: ITcpSocket,
  message: string,
  options?: ErrorFrameOptions,
): Promise<boolean> {
  try {
    await writeFrame(socket, fromString(message), ERROR_CONTENT_TYPE, options);
    return true;
  } catch (err) {
    options?.logger?.debug("Could not deliver error frame:", err);
    return false;
  }
}
