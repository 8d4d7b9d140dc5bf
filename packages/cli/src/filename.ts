import { createHash } from "node:crypto";

const EXTENSIONS: Array<[needle: string, ext: string]> = [
  ["html", ".html"],
  ["plain", ".txt"],
  ["json", ".json"],
  ["xml", ".xml"],
  ["javascript", ".js"],
];

interface UrlParts {
  host: string;
  path: string;
  query: string;
}

function splitUrl(url: string): UrlParts {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { host: "", path: "", query: "" };
  }
  return {
    host: parsed.host,
    path: parsed.pathname,
    query: parsed.search.slice(1),
  };
}

export function extensionFor(contentType: string): string {
  const type = contentType.toLowerCase();
  for (const [needle, ext] of EXTENSIONS) {
    if (type.includes(needle)) {
      return ext;
    }
  }
  return type.startsWith("text/") ? ".txt" : ".bin";
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function timestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Name for a saved response, e.g.
 * `example.com_8080_index.html_7de36096_20240102_030405.html`.
 */
export function outputFilename(
  url: string,
  contentType: string,
  now: Date = new Date(),
): string {
  const { host, path, query } = splitUrl(url);

  let base = host.replaceAll(":", "_") || "page";
  const trimmed = path.replace(/\/+$/, "");
  if (trimmed) {
    base += `_${trimmed.slice(trimmed.lastIndexOf("/") + 1)}`;
  }
  if (query) {
    const digest = createHash("sha1").update(query).digest("hex");
    base += `_${digest.slice(0, 8)}`;
  }

  const filename = `${base}_${timestamp(now)}${extensionFor(contentType)}`;
  return filename.replace(/[^A-Za-z0-9._-]/g, "");
}
