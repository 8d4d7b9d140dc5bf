import {
  basicLogger,
  createNodeRelayServer,
  defaultServerConfig,
  prefixedLogger,
  VERSION,
} from "@framerelay/engine";
import { parseServerArgs } from "./args.js";

function printHelp(): void {
  console.log(`
framerelay-server - fetch URLs on behalf of clients and relay them framed

Usage: framerelay-server [port] [options]

Options:
  --port, -p <port>    Port to listen on (default: 8888)
  --host, -H <host>    Host to bind (default: 0.0.0.0)
  --quiet, -q          Suppress per-connection logging
  --version, -v        Show version
  --help, -h           Show this help
`);
}

async function main(): Promise<void> {
  const parsed = parseServerArgs(process.argv.slice(2));
  switch (parsed.kind) {
    case "help":
      printHelp();
      return;
    case "version":
      console.log(VERSION);
      return;
    case "error":
      console.error(parsed.message);
      printHelp();
      process.exitCode = 1;
      return;
  }

  const logger = prefixedLogger("framerelay", basicLogger());
  const server = createNodeRelayServer({
    config: { ...defaultServerConfig(), ...parsed.options },
    logger,
  });

  await server.start();

  let stopping = false;
  const shutdown = () => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down, waiting for open connections...");
    void server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
