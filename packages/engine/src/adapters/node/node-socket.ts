import * as net from "node:net";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
  TcpSocketOptions,
} from "../../interfaces/socket.js";

export class NodeTcpSocket implements ITcpSocket {
  private socket: net.Socket;

  constructor(socket?: net.Socket) {
    this.socket = socket || new net.Socket({ allowHalfOpen: true });
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  connect(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.socket.once("error", onError);
      this.socket.connect(port, host, () => {
        this.socket.off("error", onError);
        resolve();
      });
    });
  }

  /**
   * Node queues the whole buffer on write, so a successful write accepts
   * every byte. Resolves once the data has been handed to the kernel or,
   * under backpressure, once the socket drains; resolves with 0 when the
   * socket is no longer writable.
   */
  write(data: Uint8Array): Promise<number> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.resolve(0);
    }

    return new Promise((resolve, reject) => {
      let settled = false;

      const done = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(data.length);
      };

      const fail = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        reject(err);
      };

      const onDrain = () => done();
      const onClose = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(0);
      };
      const onError = (err: Error) => fail(err);

      const cleanup = () => {
        this.socket.off("drain", onDrain);
        this.socket.off("close", onClose);
        this.socket.off("error", onError);
      };

      this.socket.once("close", onClose);
      this.socket.once("error", onError);

      try {
        const accepted = this.socket.write(data, (err) => {
          if (err) fail(err);
        });
        if (accepted) {
          done();
        } else {
          this.socket.once("drain", onDrain);
        }
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  onData(cb: (data: Uint8Array) => void): void {
    this.socket.on("data", (data: Buffer) => {
      cb(new Uint8Array(data));
    });
  }

  onEnd(cb: () => void): void {
    this.socket.on("end", cb);
  }

  onClose(cb: (hadError: boolean) => void): void {
    this.socket.on("close", cb);
  }

  onError(cb: (err: Error) => void): void {
    this.socket.on("error", cb);
  }

  close(): void {
    if (this.socket.destroyed) {
      return;
    }
    // Queued writes are flushed and a FIN sent before the socket is torn down.
    this.socket.destroySoon();
  }
}

export class NodeTcpServer implements ITcpServer {
  private server: net.Server;

  constructor() {
    // A client may half-close after its request and still expect the frame.
    this.server = net.createServer({ allowHalfOpen: true });
  }

  listen(options: ListenOptions, callback?: () => void): void {
    this.server.listen(
      { port: options.port, host: options.host, backlog: options.backlog },
      callback,
    );
  }

  address(): { port: number } | null {
    const addr = this.server.address();
    if (addr && typeof addr === "object" && "port" in addr) {
      return { port: addr.port };
    }
    return null;
  }

  on(event: "connection", cb: (socket: unknown) => void): void;
  on(event: "error", cb: (err: Error) => void): void;
  on(
    event: "connection" | "error",
    cb: ((socket: unknown) => void) | ((err: Error) => void),
  ): void {
    if (event === "connection") {
      this.server.on("connection", cb as (socket: net.Socket) => void);
      return;
    }
    this.server.on("error", cb as (err: Error) => void);
  }

  close(callback?: () => void): void {
    this.server.close(() => callback?.());
  }
}

export class NodeSocketFactory implements ISocketFactory {
  async createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket> {
    const socket = new NodeTcpSocket();
    if (options?.host && options?.port) {
      await socket.connect(options.port, options.host);
    }
    return socket;
  }

  createTcpServer(): ITcpServer {
    return new NodeTcpServer();
  }

  wrapTcpSocket(socket: unknown): ITcpSocket {
    if (!(socket instanceof net.Socket)) {
      throw new Error("Expected a Node net.Socket");
    }
    return new NodeTcpSocket(socket);
  }
}
