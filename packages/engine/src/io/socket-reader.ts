import type { ITcpSocket } from "../interfaces/socket.js";
import { NEWLINE } from "../protocol/constants.js";
import { concat } from "../utils/buffer.js";

export type SocketReadErrorCode =
  | "IDLE_TIMEOUT"
  | "READ_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "LINE_TOO_LONG";

export class SocketReadError extends Error {
  constructor(
    readonly code: SocketReadErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SocketReadError";
  }
}

export interface ReadLineOptions {
  /** Upper bound on bytes buffered while looking for the delimiter. */
  maxBytes: number;
  /** Absolute time (ms since epoch) by which the line must be complete. */
  deadline: number;
  /** Delimiter byte. Default: newline. */
  delimiter?: number;
}

export interface ReadExactlyOptions {
  deadline: number;
}

/**
 * Buffers data arriving on a socket and serves delimiter- and length-based
 * reads regardless of how the transport fragments it. Received chunks are
 * kept as a list and joined once per read.
 */
export class SocketReader {
  private chunks: Uint8Array[] = [];
  private length = 0;
  /** The peer will send nothing more: it ended, closed or failed. */
  private inputEnded = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];
  /** Incoming bytes beyond this buffer size are dropped. */
  private bufferLimit = Number.POSITIVE_INFINITY;
  private discarding = false;

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      if (this.discarding) {
        return;
      }
      const room = this.bufferLimit - this.length;
      if (room <= 0) {
        return;
      }
      this.chunks.push(data.length > room ? data.subarray(0, room) : data);
      this.length += Math.min(data.length, room);
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.inputEnded = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.inputEnded = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.inputEnded = true;
      this.notifyWaiters();
    });
  }

  /** Bytes received but not yet consumed. */
  get buffered(): number {
    return this.length;
  }

  /**
   * Drop everything buffered and everything that arrives from now on.
   * Reads still observe the end of input and socket errors.
   */
  stopReading(): void {
    this.discarding = true;
    this.chunks = [];
    this.length = 0;
  }

  /**
   * Resolve with the bytes before the first delimiter. Everything after the
   * delimiter is discarded, and buffering stops at `maxBytes`.
   */
  async readLine(options: ReadLineOptions): Promise<Uint8Array> {
    const delimiter = options.delimiter ?? NEWLINE;
    this.bufferLimit = options.maxBytes;
    let searched = 0;

    try {
      while (true) {
        const buffer = this.joinAll();
        const index = buffer.indexOf(delimiter, searched);
        if (index !== -1) {
          this.chunks = [];
          this.length = 0;
          return buffer.subarray(0, index);
        }
        searched = buffer.length;

        if (buffer.length >= options.maxBytes) {
          throw new SocketReadError(
            "LINE_TOO_LONG",
            `Line exceeds ${options.maxBytes} bytes`,
          );
        }

        this.throwIfEnded("Connection closed before newline");

        const hadActivity = await this.waitForActivity(
          options.deadline - Date.now(),
        );
        if (!hadActivity) {
          throw this.timeoutError();
        }
      }
    } finally {
      this.bufferLimit = Number.POSITIVE_INFINITY;
    }
  }

  /**
   * Resolve with exactly `length` bytes, or with whatever arrived before the
   * peer stopped sending. Timeouts and socket errors reject.
   */
  async readExactly(
    length: number,
    options: ReadExactlyOptions,
  ): Promise<Uint8Array> {
    while (this.length < length) {
      if (this.socketError) {
        throw this.socketError;
      }

      if (this.inputEnded) {
        break;
      }

      const hadActivity = await this.waitForActivity(
        options.deadline - Date.now(),
      );
      if (!hadActivity) {
        throw new SocketReadError(
          "READ_TIMEOUT",
          `Timed out after receiving ${this.length} of ${length} bytes`,
        );
      }
    }

    return this.take(Math.min(length, this.length));
  }

  /** Collapse the chunk list into one buffer and return it. */
  private joinAll(): Uint8Array {
    if (this.chunks.length !== 1) {
      this.chunks = [concat(this.chunks)];
    }
    return this.chunks[0];
  }

  /** Remove and return the first `count` buffered bytes. */
  private take(count: number): Uint8Array {
    const taken: Uint8Array[] = [];
    let remaining = count;
    while (remaining > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        taken.push(head);
        this.chunks.shift();
        remaining -= head.length;
      } else {
        taken.push(head.subarray(0, remaining));
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
    this.length -= count;
    return taken.length === 1 ? taken[0] : concat(taken);
  }

  private throwIfEnded(incompleteMessage: string): void {
    if (this.socketError) {
      throw this.socketError;
    }

    if (!this.inputEnded) {
      return;
    }

    if (this.length === 0) {
      throw new SocketReadError("CONNECTION_CLOSED", "Connection closed");
    }

    throw new SocketReadError(
      "CONNECTION_CLOSED_INCOMPLETE",
      incompleteMessage,
    );
  }

  private timeoutError(): SocketReadError {
    if (this.length === 0) {
      return new SocketReadError("IDLE_TIMEOUT", "Connection idle timed out");
    }
    return new SocketReadError(
      "READ_TIMEOUT",
      "Read timed out before completion",
    );
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}
