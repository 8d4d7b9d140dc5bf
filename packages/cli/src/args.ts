import { defaultClientConfig, defaultServerConfig } from "@framerelay/engine";

export type ParseResult<T> =
  | { kind: "run"; options: T }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export interface ServerArgs {
  port: number;
  host: string;
  quiet: boolean;
}

export interface ClientArgs {
  host: string;
  port: number;
  url: string;
  outDir: string;
  timeoutMs: number;
}

function parsePort(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const port = Number.parseInt(value, 10);
  return port <= 65535 ? port : null;
}

function parsePositiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

export function parseServerArgs(args: string[]): ParseResult<ServerArgs> {
  const defaults = defaultServerConfig();
  let port = defaults.port;
  let host = defaults.host;
  let quiet = defaults.quiet;
  let sawPort = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p" || !arg.startsWith("-")) {
      const value = arg.startsWith("-") ? args[++i] : arg;
      const parsed = parsePort(value);
      if (parsed === null) {
        return { kind: "error", message: `Invalid port number: ${value ?? ""}` };
      }
      if (sawPort) {
        return { kind: "error", message: `Unexpected argument: ${arg}` };
      }
      port = parsed;
      sawPort = true;
    } else if (arg === "--host" || arg === "-H") {
      const value = args[++i];
      if (!value) {
        return { kind: "error", message: "--host requires a value" };
      }
      host = value;
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  return { kind: "run", options: { port, host, quiet } };
}

export function parseClientArgs(args: string[]): ParseResult<ClientArgs> {
  const positional: string[] = [];
  let outDir = ".";
  let timeoutMs = defaultClientConfig().timeoutMs;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--out-dir" || arg === "-o") {
      const value = args[++i];
      if (!value) {
        return { kind: "error", message: "--out-dir requires a value" };
      }
      outDir = value;
    } else if (arg === "--timeout" || arg === "-t") {
      const parsed = parsePositiveInt(args[++i]);
      if (parsed === null) {
        return {
          kind: "error",
          message: "--timeout requires a positive number of milliseconds",
        };
      }
      timeoutMs = parsed;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      positional.push(arg);
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
    i++;
  }

  if (positional.length < 3) {
    return { kind: "error", message: "Missing arguments" };
  }
  if (positional.length > 3) {
    return {
      kind: "error",
      message: `Unexpected argument: ${positional[3]}`,
    };
  }

  const [host, rawPort, url] = positional;
  const port = parsePort(rawPort);
  if (port === null || port === 0) {
    return { kind: "error", message: `Invalid port number: ${rawPort}` };
  }

  return { kind: "run", options: { host, port, url, outDir, timeoutMs } };
}
