import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  basicLogger,
  createNodeRelayClient,
  filteredLogger,
  type RelayResponse,
  VERSION,
} from "@framerelay/engine";
import { parseClientArgs } from "./args.js";
import { outputFilename } from "./filename.js";

function printUsage(): void {
  console.log(`
framerelay-client - fetch a URL through a framerelay server and save it

Usage: framerelay-client <proxy_host> <proxy_port> <url> [options]

Options:
  --out-dir, -o <dir>  Directory to save into (default: current directory)
  --timeout, -t <ms>   Overall timeout (default: 30000)
  --version, -v        Show version
  --help, -h           Show this help

Example: framerelay-client 127.0.0.1 8888 https://example.com/
`);
}

async function main(): Promise<void> {
  const parsed = parseClientArgs(process.argv.slice(2));
  switch (parsed.kind) {
    case "help":
      printUsage();
      return;
    case "version":
      console.log(VERSION);
      return;
    case "error":
      console.error(parsed.message);
      printUsage();
      process.exitCode = 1;
      return;
  }

  const { host, port, url, outDir, timeoutMs } = parsed.options;
  const client = createNodeRelayClient({
    config: { timeoutMs },
    logger: filteredLogger("warn", basicLogger()),
  });

  let response: RelayResponse;
  try {
    response = await client.fetch(host, port, url);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 2;
    return;
  }

  const file = path.join(outDir, outputFilename(url, response.contentType));
  await fs.mkdir(outDir, { recursive: true });
  await fs.writeFile(file, response.body);
  console.log(
    `Saved ${response.body.length} bytes to ${file} (Content-Type: ${response.contentType})`,
  );
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
