/** Width of the decimal body-length field. */
export const LENGTH_HEADER_SIZE = 10;

/** Width of the space-padded content-type field. */
export const CONTENT_TYPE_HEADER_SIZE = 100;

export const FRAME_HEADER_SIZE = LENGTH_HEADER_SIZE + CONTENT_TYPE_HEADER_SIZE;

/** Largest body length that fits in the length header. */
export const MAX_BODY_LENGTH = 10 ** LENGTH_HEADER_SIZE - 1;

export const MAX_REQUEST_LINE_BYTES = 8 * 1024;

export const ERROR_CONTENT_TYPE = "text/plain; charset=utf-8";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export const NEWLINE = 0x0a;

export const PADDING_BYTE = 0x20;
