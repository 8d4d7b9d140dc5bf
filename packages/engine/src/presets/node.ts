import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import { RelayClient } from "../client/relay-client.js";
import type { ClientConfig, ServerConfig } from "../config/relay-config.js";
import { HttpFetcher } from "../fetch/http-fetcher.js";
import type { Fetcher } from "../fetch/types.js";
import type { Logger } from "../logging/logger.js";
import { RelayServer } from "../server/relay-server.js";

export interface NodeRelayServerOptions {
  config: ServerConfig;
  logger?: Logger;
  /** Defaults to an HttpFetcher over the platform fetch. */
  fetcher?: Fetcher;
}

export function createNodeRelayServer(
  options: NodeRelayServerOptions,
): RelayServer {
  return new RelayServer({
    socketFactory: new NodeSocketFactory(),
    fetcher: options.fetcher ?? new HttpFetcher(),
    config: options.config,
    logger: options.logger,
  });
}

export interface NodeRelayClientOptions {
  config?: ClientConfig;
  logger?: Logger;
}

export function createNodeRelayClient(
  options?: NodeRelayClientOptions,
): RelayClient {
  return new RelayClient({
    socketFactory: new NodeSocketFactory(),
    timeoutMs: options?.config?.timeoutMs,
    logger: options?.logger,
  });
}
