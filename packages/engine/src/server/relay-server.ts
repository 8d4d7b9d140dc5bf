import type { ServerConfig } from "../config/relay-config.js";
import type { Fetcher } from "../fetch/types.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger, filteredLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { type ConnectionReport, handleConnection } from "./connection-handler.js";

export interface RelayServerOptions {
  socketFactory: ISocketFactory;
  fetcher: Fetcher;
  config: ServerConfig;
  logger?: Logger;
}

export type RelayServerEvents = {
  listening: [port: number];
  connection: [report: ConnectionReport];
  error: [err: Error];
  close: [];
};

/**
 * Accepts connections and hands each one to an independent handler. The
 * accept loop only dispatches; handlers share nothing with each other.
 */
export class RelayServer extends EventEmitter<RelayServerEvents> {
  private socketFactory: ISocketFactory;
  private fetcher: Fetcher;
  private config: ServerConfig;
  private logger: Logger;
  private connectionLogger: Logger;
  private tcpServer: ITcpServer | null = null;
  private inFlight: Set<Promise<void>> = new Set();

  constructor(options: RelayServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.fetcher = options.fetcher;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.connectionLogger = this.config.quiet
      ? filteredLogger("warn", this.logger)
      : this.logger;
  }

  /** Number of connections currently being handled. */
  get activeConnections(): number {
    return this.inFlight.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Could not accept connection:", err);
          return;
        }
        this.dispatch(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(
        {
          port: this.config.port,
          host: this.config.host,
          backlog: this.config.backlog,
        },
        () => {
          if (settled) return;
          settled = true;
          const addr = server.address();
          const port = addr?.port ?? this.config.port;
          this.logger.info(
            `Relay server listening on ${this.config.host}:${port}`,
          );
          this.emit("listening", port);
          resolve(port);
        },
      );
    });
  }

  /**
   * Stop accepting new connections. Connections already accepted are left to
   * finish on their own; the promise resolves once they have.
   */
  async stop(): Promise<void> {
    const server = this.tcpServer;
    this.tcpServer = null;

    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await Promise.all(this.inFlight);

    this.emit("close");
  }

  private dispatch(socket: ITcpSocket): void {
    const task = handleConnection(socket, {
      fetcher: this.fetcher,
      ioTimeoutMs: this.config.ioTimeoutMs,
      fetchTimeoutMs: this.config.fetchTimeoutMs,
      maxRequestLineBytes: this.config.maxRequestLineBytes,
      logger: this.connectionLogger,
    });

    const tracked: Promise<void> = task
      .then((report) => {
        this.emit("connection", report);
      })
      .catch((err: unknown) => {
        this.logger.error("Connection handler failed:", err);
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }
}
