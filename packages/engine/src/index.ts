// Node adapters
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Client
export type {
  RelayClientErrorCode,
  RelayClientOptions,
  RelayResponse,
} from "./client/relay-client.js";
export {
  RelayClient,
  RelayClientError,
  readFrame,
} from "./client/relay-client.js";
// Config
export type { ClientConfig, ServerConfig } from "./config/relay-config.js";
export {
  defaultClientConfig,
  defaultServerConfig,
} from "./config/relay-config.js";
// Fetch
export type { FetchFn, HttpFetcherOptions } from "./fetch/http-fetcher.js";
export { classifyFetchError, HttpFetcher } from "./fetch/http-fetcher.js";
export type {
  FetchFailure,
  Fetcher,
  FetchOptions,
  FetchOutcome,
} from "./fetch/types.js";
export { describeFetchFailure } from "./fetch/types.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
  ListenOptions,
  TcpSocketOptions,
} from "./interfaces/socket.js";
// IO
export type { SocketReadErrorCode } from "./io/socket-reader.js";
export { SocketReader, SocketReadError } from "./io/socket-reader.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  peerLabel,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type {
  NodeRelayClientOptions,
  NodeRelayServerOptions,
} from "./presets/node.js";
export {
  createNodeRelayClient,
  createNodeRelayServer,
} from "./presets/node.js";
// Protocol
export * from "./protocol/constants.js";
export { writeErrorFrame } from "./protocol/error-frame.js";
export type { FramingErrorCode } from "./protocol/frame.js";
export {
  encodeContentTypeHeader,
  encodeErrorFrame,
  encodeFrame,
  encodeFrameHeader,
  encodeLengthHeader,
  FramingError,
  parseContentTypeHeader,
  parseLengthHeader,
} from "./protocol/frame.js";
export type { FrameWriteErrorCode, WriteOptions } from "./protocol/frame-writer.js";
export { FrameWriteError, writeFrame, writeFully } from "./protocol/frame-writer.js";
export type { RequestParseResult } from "./protocol/request.js";
export { parseRequestLine, readRequestUrl } from "./protocol/request.js";
// Server
export type {
  ConnectionOutcome,
  ConnectionReport,
  ConnectionState,
} from "./server/connection-handler.js";
export { handleConnection } from "./server/connection-handler.js";
export type {
  RelayServerEvents,
  RelayServerOptions,
} from "./server/relay-server.js";
export { RelayServer } from "./server/relay-server.js";
export {
  InMemorySocketFactory,
  InMemoryTcpSocket,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
export { VERSION } from "./version.js";
