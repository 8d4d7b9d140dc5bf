import {
  concat,
  decodeToString,
  fromString,
  trimAsciiWhitespace,
} from "../utils/buffer.js";
import {
  CONTENT_TYPE_HEADER_SIZE,
  ERROR_CONTENT_TYPE,
  LENGTH_HEADER_SIZE,
  MAX_BODY_LENGTH,
  PADDING_BYTE,
} from "./constants.js";

export type FramingErrorCode =
  | "BODY_TOO_LARGE"
  | "INVALID_LENGTH"
  | "INVALID_LENGTH_HEADER";

export class FramingError extends Error {
  constructor(
    readonly code: FramingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FramingError";
  }
}

const DIGIT_ZERO = 0x30;
const DIGIT_NINE = 0x39;

/**
 * Encode a body length as exactly ten ASCII digits, zero-padded on the left.
 */
export function encodeLengthHeader(length: number): Uint8Array {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new FramingError(
      "INVALID_LENGTH",
      `Invalid body length: ${length}`,
    );
  }
  if (length > MAX_BODY_LENGTH) {
    throw new FramingError(
      "BODY_TOO_LARGE",
      `Body length ${length} does not fit in a ${LENGTH_HEADER_SIZE}-digit header`,
    );
  }
  return fromString(String(length).padStart(LENGTH_HEADER_SIZE, "0"));
}

/**
 * Encode a content type into the fixed-width header field. Values longer than
 * the field are cut at the byte boundary, shorter ones padded with spaces.
 */
export function encodeContentTypeHeader(contentType: string): Uint8Array {
  const encoded = fromString(contentType);
  const header = new Uint8Array(CONTENT_TYPE_HEADER_SIZE).fill(PADDING_BYTE);
  header.set(encoded.subarray(0, CONTENT_TYPE_HEADER_SIZE));
  return header;
}

export function encodeFrameHeader(
  bodyLength: number,
  contentType: string,
): Uint8Array {
  return concat([
    encodeLengthHeader(bodyLength),
    encodeContentTypeHeader(contentType),
  ]);
}

export function encodeFrame(body: Uint8Array, contentType: string): Uint8Array {
  return concat([encodeFrameHeader(body.length, contentType), body]);
}

export function encodeErrorFrame(message: string): Uint8Array {
  return encodeFrame(fromString(message), ERROR_CONTENT_TYPE);
}

/**
 * Parse a length header. Surrounding ASCII whitespace is tolerated; anything
 * other than decimal digits between it is rejected.
 */
export function parseLengthHeader(header: Uint8Array): number {
  const digits = trimAsciiWhitespace(header);
  if (digits.length === 0) {
    throw new FramingError("INVALID_LENGTH_HEADER", "invalid length header");
  }

  let value = 0;
  for (const byte of digits) {
    if (byte < DIGIT_ZERO || byte > DIGIT_NINE) {
      throw new FramingError("INVALID_LENGTH_HEADER", "invalid length header");
    }
    value = value * 10 + (byte - DIGIT_ZERO);
  }
  return value;
}

/** Strip the space padding from a content-type header and decode it. */
export function parseContentTypeHeader(header: Uint8Array): string {
  let end = header.length;
  while (end > 0 && header[end - 1] === PADDING_BYTE) end--;
  return decodeToString(header.subarray(0, end));
}
