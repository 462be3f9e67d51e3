import type { DecodeResult } from "../types/protocol";

/** Width of the little-endian int32 byte-length header in front of every frame. */
export const FRAME_HEADER_BYTES = 4;

/** Text inside a frame is UTF-16LE. */
export const FRAME_TEXT_ENCODING = "utf16le";

/**
 * Wrap a message string in a length-prefixed frame.
 */
export function encodeFrame(text: string): Buffer {
  const body = Buffer.from(text, FRAME_TEXT_ENCODING);
  const frame = Buffer.alloc(FRAME_HEADER_BYTES + body.length);
  frame.writeInt32LE(body.length, 0);
  body.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Unwrap a length-prefixed frame. Bytes past the declared length are ignored.
 */
export function decodeFrame(payload: Uint8Array): DecodeResult<string> {
  if (payload.length < FRAME_HEADER_BYTES) {
    return { ok: false, error: "frame shorter than header" };
  }

  const buf = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
  const length = buf.readInt32LE(0);

  if (length < 0) {
    return { ok: false, error: "negative frame length" };
  }
  if (FRAME_HEADER_BYTES + length > buf.length) {
    return { ok: false, error: `frame declares ${length} bytes, ${buf.length - FRAME_HEADER_BYTES} present` };
  }
  if (length % 2 !== 0) {
    return { ok: false, error: "odd byte count for utf16le text" };
  }

  const text = buf.toString(FRAME_TEXT_ENCODING, FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length);
  return { ok: true, value: text };
}
