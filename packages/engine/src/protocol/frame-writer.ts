import type { ITcpSocket } from "../interfaces/socket.js";
import { encodeFrameHeader } from "./frame.js";

const DEFAULT_WRITE_TIMEOUT_MS = 30_000;

export type FrameWriteErrorCode = "CONNECTION_BROKEN" | "WRITE_TIMEOUT";

export class FrameWriteError extends Error {
  constructor(
    readonly code: FrameWriteErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FrameWriteError";
  }
}

export interface WriteOptions {
  timeoutMs?: number;
}

/**
 * Write every byte of `data`, re-offering the remainder whenever the
 * transport accepts only part of it.
 */
export async function writeFully(
  socket: ITcpSocket,
  data: Uint8Array,
  options?: WriteOptions,
): Promise<void> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  const deadline = Date.now() + timeoutMs;
  let offset = 0;

  while (offset < data.length) {
    const written = await withDeadline(
      socket.write(data.subarray(offset)),
      deadline,
      () =>
        new FrameWriteError(
          "WRITE_TIMEOUT",
          `Write timed out after ${offset} of ${data.length} bytes`,
        ),
    );
    if (written <= 0) {
      throw new FrameWriteError(
        "CONNECTION_BROKEN",
        "socket connection broken during send",
      );
    }
    offset += written;
  }
}

/**
 * Send a complete frame: the 110-byte header unit first, then the body.
 * The body must be fully resident since the header carries its length.
 */
export async function writeFrame(
  socket: ITcpSocket,
  body: Uint8Array,
  contentType: string,
  options?: WriteOptions,
): Promise<void> {
  const header = encodeFrameHeader(body.length, contentType);
  const timeoutMs = options?.timeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  const deadline = Date.now() + timeoutMs;

  await writeFully(socket, header, { timeoutMs });
  if (body.length > 0) {
    await writeFully(socket, body, {
      timeoutMs: Math.max(0, deadline - Date.now()),
    });
  }
}

function withDeadline<T>(
  promise: Promise<T>,
  deadline: number,
  onTimeout: () => Error,
): Promise<T> {
  const remaining = deadline - Date.now();
  if (remaining <= 0) {
    return Promise.reject(onTimeout());
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), remaining);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
