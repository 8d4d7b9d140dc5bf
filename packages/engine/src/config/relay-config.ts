import { MAX_REQUEST_LINE_BYTES } from "../protocol/constants.js";

export interface ServerConfig {
  /** Port to listen on. Default: 8888 */
  port: number;
  /** Host/IP to bind. Default: '0.0.0.0' */
  host: string;
  /** Pending-connection queue depth. Default: 100 */
  backlog: number;
  /** Idle/read/write timeout for the client connection. Default: 30000ms */
  ioTimeoutMs: number;
  /** Timeout for retrieving the requested URL. Default: 15000ms */
  fetchTimeoutMs: number;
  /** Cap on bytes buffered while reading the request line. Default: 8KB */
  maxRequestLineBytes: number;
  /** Suppress per-connection logging. Default: false */
  quiet: boolean;
}

export function defaultServerConfig(): ServerConfig {
  return {
    port: 8888,
    host: "0.0.0.0",
    backlog: 100,
    ioTimeoutMs: 30_000,
    fetchTimeoutMs: 15_000,
    maxRequestLineBytes: MAX_REQUEST_LINE_BYTES,
    quiet: false,
  };
}

export interface ClientConfig {
  /** Overall budget for connect, send and the full response. Default: 30000ms */
  timeoutMs: number;
}

export function defaultClientConfig(): ClientConfig {
  return { timeoutMs: 30_000 };
}
