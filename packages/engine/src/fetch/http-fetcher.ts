import { STATUS_CODES } from "node:http";
import { DEFAULT_CONTENT_TYPE } from "../protocol/constants.js";
import { VERSION } from "../version.js";
import type {
  FetchFailure,
  Fetcher,
  FetchOptions,
  FetchOutcome,
} from "./types.js";

export type FetchFn = (input: URL, init: RequestInit) => Promise<Response>;

export interface HttpFetcherOptions {
  userAgent?: string;
  /** Override the platform fetch, e.g. in tests. */
  fetchImpl?: FetchFn;
}

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Fetcher backed by the platform `fetch`. Redirects are followed; any status
 * outside 2xx after that is reported as an HTTP failure.
 */
export class HttpFetcher implements Fetcher {
  private readonly userAgent: string;
  private readonly fetchImpl: FetchFn;

  constructor(options?: HttpFetcherOptions) {
    this.userAgent = options?.userAgent ?? `framerelay/${VERSION}`;
    this.fetchImpl = options?.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchOutcome> {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return failed({ kind: "transport", reason: `invalid URL: ${url}` });
    }

    if (!SUPPORTED_PROTOCOLS.has(target.protocol)) {
      return failed({
        kind: "transport",
        reason: `unsupported URL scheme: ${target.protocol.slice(0, -1)}`,
      });
    }

    const signal = AbortSignal.timeout(options.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(target, {
        headers: { "User-Agent": this.userAgent },
        redirect: "follow",
        signal,
      });
    } catch (err) {
      return failed(classifyFetchError(err));
    }

    if (!response.ok) {
      await discardBody(response);
      return failed({
        kind: "http-status",
        status: response.status,
        reason: response.statusText || STATUS_CODES[response.status] || "",
      });
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      return failed(classifyFetchError(err));
    }

    return {
      ok: true,
      body,
      contentType: response.headers.get("content-type") || DEFAULT_CONTENT_TYPE,
    };
  }
}

function failed(failure: FetchFailure): FetchOutcome {
  return { ok: false, failure };
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // Body already consumed or stream errored; nothing left to release.
  }
}

/**
 * Map a thrown fetch error onto the failure taxonomy. Network-level problems
 * surface from undici as a TypeError whose `cause` carries the system error.
 */
export function classifyFetchError(err: unknown): FetchFailure {
  if (err instanceof Error && err.name === "TimeoutError") {
    return { kind: "transport", reason: "timed out" };
  }

  if (err instanceof TypeError && err.cause instanceof Error) {
    return { kind: "transport", reason: describeCause(err.cause) };
  }

  if (err instanceof Error) {
    return { kind: "other", message: err.message || err.name };
  }

  return { kind: "other", message: String(err) };
}

function describeCause(cause: Error): string {
  if (cause.message) {
    return cause.message;
  }
  if ("code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  if (cause instanceof AggregateError) {
    for (const inner of cause.errors) {
      if (inner instanceof Error && inner.message) {
        return inner.message;
      }
    }
  }
  return cause.name;
}
