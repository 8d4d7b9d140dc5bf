export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function basicLogger(): Logger {
  return console;
}

export function silentLogger(): Logger {
  const noop = () => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}

export function prefixedLogger(
  prefix: string,
  base: Logger = basicLogger(),
): Logger {
  return {
    debug: (msg, ...args) => base.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => base.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => base.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => base.error(`[${prefix}] ${msg}`, ...args),
  };
}

export function filteredLogger(
  level: LogLevel,
  base: Logger = basicLogger(),
): Logger {
  const minPriority = LEVEL_PRIORITY[level];
  const noop = () => {};
  return {
    debug: minPriority <= 0 ? base.debug.bind(base) : noop,
    info: minPriority <= 1 ? base.info.bind(base) : noop,
    warn: minPriority <= 2 ? base.warn.bind(base) : noop,
    error: base.error.bind(base),
  };
}

/** Label a connection by its peer, e.g. `127.0.0.1:52114`. */
export function peerLabel(address?: string, port?: number): string {
  if (!address) return "unknown peer";
  return port === undefined ? address : `${address}:${port}`;
}
