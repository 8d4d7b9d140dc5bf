const encoder = new TextEncoder();
// A leading U+FEFF is content here, not a byte-order mark to strip.
const lenientDecoder = new TextDecoder("utf-8", { ignoreBOM: true });
const strictDecoder = new TextDecoder("utf-8", {
  fatal: true,
  ignoreBOM: true,
});

export function concat(chunks: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) {
    total += chunk.length;
  }

  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

export function fromString(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8, replacing invalid sequences with U+FFFD. */
export function decodeToString(data: Uint8Array): string {
  return lenientDecoder.decode(data);
}

/** Decode UTF-8, returning null when the bytes are not valid UTF-8. */
export function decodeUtf8Strict(data: Uint8Array): string | null {
  try {
    return strictDecoder.decode(data);
  } catch {
    return null;
  }
}

function isAsciiWhitespace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

/** Strip leading and trailing ASCII whitespace (space, \t \n \v \f \r). */
export function trimAsciiWhitespace(data: Uint8Array): Uint8Array {
  let start = 0;
  let end = data.length;
  while (start < end && isAsciiWhitespace(data[start])) start++;
  while (end > start && isAsciiWhitespace(data[end - 1])) end--;
  return data.subarray(start, end);
}
