export interface FetchOptions {
  timeoutMs: number;
}

/** Why a fetch failed, with enough structure to format a stable message. */
export type FetchFailure =
  | { kind: "http-status"; status: number; reason: string }
  | { kind: "transport"; reason: string }
  | { kind: "other"; message: string };

export type FetchOutcome =
  | { ok: true; body: Uint8Array; contentType: string }
  | { ok: false; failure: FetchFailure };

/**
 * Retrieves a URL on behalf of the relay. Implementations make exactly one
 * attempt and report failures as values; they do not throw.
 */
export interface Fetcher {
  fetch(url: string, options: FetchOptions): Promise<FetchOutcome>;
}

export function describeFetchFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case "http-status":
      return `HTTP error ${failure.status}: ${failure.reason}`;
    case "transport":
      return `URL error: ${failure.reason}`;
    case "other":
      return `Fetch failed: ${failure.message}`;
  }
}
