import { type ChildProcess, spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

const SERVER_PATH = fileURLToPath(new URL("../server.ts", import.meta.url));
const CLIENT_PATH = fileURLToPath(new URL("../client.ts", import.meta.url));
const describeSocket =
  process.env.FRAMERELAY_SOCKET_TESTS === "1" ? describe : describe.skip;

interface ServerHandle {
  proc: ChildProcess;
  port: number;
  output: string;
}

interface RunResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

const procs = new Set<ChildProcess>();

function tsxArgs(script: string, args: string[]): string[] {
  return ["--import", "tsx", script, ...args];
}

function startServer(args: string[] = []): Promise<ServerHandle> {
  return new Promise((resolve, reject) => {
    const proc = spawn(
      process.execPath,
      tsxArgs(SERVER_PATH, ["0", "--host", "127.0.0.1", ...args]),
      { stdio: ["ignore", "pipe", "pipe"] },
    );
    procs.add(proc);
    proc.on("close", () => procs.delete(proc));

    const handle: ServerHandle = { proc, port: 0, output: "" };

    proc.stdout?.on("data", (chunk: Buffer) => {
      handle.output += chunk.toString();
      const match = handle.output.match(/listening on 127\.0\.0\.1:(\d+)/);
      if (match) {
        handle.port = Number.parseInt(match[1], 10);
        resolve(handle);
      }
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      handle.output += chunk.toString();
    });

    proc.on("error", reject);
    setTimeout(() => reject(new Error("Server did not start in time")), 10000);
  });
}

async function stopServer(handle: ServerHandle): Promise<number | null> {
  handle.proc.kill("SIGINT");
  return new Promise((resolve) => {
    handle.proc.on("close", (code) => resolve(code));
    setTimeout(() => resolve(null), 5000);
  });
}

function runClient(args: string[]): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(process.execPath, tsxArgs(CLIENT_PATH, args), {
      stdio: ["ignore", "pipe", "pipe"],
    });
    procs.add(proc);
    const result: RunResult = { code: null, stdout: "", stderr: "" };
    proc.stdout?.on("data", (chunk: Buffer) => {
      result.stdout += chunk.toString();
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      result.stderr += chunk.toString();
    });
    proc.on("error", reject);
    proc.on("close", (code) => {
      procs.delete(proc);
      result.code = code;
      resolve(result);
    });
  });
}

let tmpDir: string;

beforeAll(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "framerelay-e2e-"));
});

afterAll(async () => {
  for (const proc of procs) {
    proc.kill("SIGKILL");
  }
  procs.clear();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describeSocket("framerelay CLI e2e", () => {
  it("saves an error frame relayed for an unsupported URL", async () => {
    const server = await startServer(["-q"]);
    try {
      const outDir = path.join(tmpDir, "unsupported");
      const result = await runClient([
        "127.0.0.1",
        String(server.port),
        "ftp://example.com/file",
        "--out-dir",
        outDir,
      ]);

      expect(result.code).toBe(0);
      expect(result.stdout).toContain("Saved 38 bytes to ");
      expect(result.stdout).toContain(
        "(Content-Type: text/plain; charset=utf-8)",
      );

      const files = await fs.readdir(outDir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^example\.com_file_\d{8}_\d{6}\.txt$/);
      expect(await fs.readFile(path.join(outDir, files[0]), "utf8")).toBe(
        "URL error: unsupported URL scheme: ftp",
      );
    } finally {
      expect(await stopServer(server)).toBe(0);
    }
  }, 20000);

  it("exits with 2 when the relay is unreachable", async () => {
    const server = await startServer();
    const port = server.port;
    await stopServer(server);

    const result = await runClient(["127.0.0.1", String(port), "http://a.test/"]);

    expect(result.code).toBe(2);
    expect(result.stderr).toContain(
      `Error: could not connect to 127.0.0.1:${port}`,
    );
  }, 20000);

  it("exits with 1 and prints usage when arguments are missing", async () => {
    const result = await runClient(["127.0.0.1"]);

    expect(result.code).toBe(1);
    expect(result.stderr).toContain("Missing arguments");
    expect(result.stdout).toContain("Usage: framerelay-client");
  }, 20000);
});
