/**
 * Abstract Socket Interfaces
 *
 * These interfaces decouple the relay engine from any specific transport.
 * The Node adapter wraps `node:net`; tests use the in-memory factory.
 */

export interface ITcpSocket {
  /**
   * Offer data to the transport. Resolves with the number of bytes the
   * transport accepted, which may be fewer than `data.length`. A result of 0
   * means the connection can no longer carry data.
   */
  write(data: Uint8Array): Promise<number>;

  /** Register a callback for incoming data. */
  onData(cb: (data: Uint8Array) => void): void;

  /**
   * Register a callback for the peer ending its side of the connection.
   * No more data arrives after this, but writes may still succeed.
   */
  onEnd(cb: () => void): void;

  /** Register a callback for connection close. */
  onClose(cb: (hadError: boolean) => void): void;

  /** Register a callback for errors. */
  onError(cb: (err: Error) => void): void;

  /** Close the connection. Safe to call more than once. */
  close(): void;

  /** Remote peer address. */
  remoteAddress?: string;

  /** Remote peer port. */
  remotePort?: number;

  /**
   * Connect to a remote peer.
   */
  connect?(port: number, host: string): Promise<void>;
}

export interface ListenOptions {
  port: number;
  host?: string;
  /** Maximum length of the pending-connection queue. */
  backlog?: number;
}

export interface ITcpServer {
  /** Start listening; the callback fires once the server is bound. */
  listen(options: ListenOptions, callback?: () => void): void;

  /** Get the address the server is listening on. */
  address(): { port: number } | null;

  /** Register a callback for incoming connections. */
  on(event: "connection", cb: (socket: unknown) => void): void;

  /** Register a callback for server errors. */
  on(event: "error", cb: (err: Error) => void): void;

  /**
   * Stop accepting connections. The callback fires once every connection
   * accepted before the call has closed.
   */
  close(callback?: () => void): void;
}

export interface TcpSocketOptions {
  host?: string;
  port?: number;
}

export interface ISocketFactory {
  /** Create a new TCP socket, connected when host and port are given. */
  createTcpSocket(options?: TcpSocketOptions): Promise<ITcpSocket>;

  /** Create a TCP server. */
  createTcpServer(): ITcpServer;

  /** Wrap a native socket into ITcpSocket. */
  wrapTcpSocket(socket: unknown): ITcpSocket;
}
