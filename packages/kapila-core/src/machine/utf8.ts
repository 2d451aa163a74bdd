/**
 * UTF-8 scanning helpers
 *
 * Text is stored as raw bytes. Scalar values are found by skipping
 * continuation bytes (10xxxxxx); the leading byte decides how many
 * bytes one scalar occupies.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

export function encodeUtf8(text: string): Uint8Array {
  return encoder.encode(text);
}

export function decodeUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function isLeadByte(byte: number): boolean {
  return (byte & 0xc0) !== 0x80;
}

/**
 * Encoded length of the scalar starting with `lead`
 */
export function sequenceLength(lead: number): number {
  if ((lead & 0xf0) === 0xf0) return 4;
  if ((lead & 0xe0) === 0xe0) return 3;
  if ((lead & 0xc0) === 0xc0) return 2;
  return 1;
}

export function countScalars(bytes: Uint8Array): number {
  let count = 0;
  for (const byte of bytes) {
    if (isLeadByte(byte)) count++;
  }
  return count;
}

export interface ByteSpan {
  start: number;
  end: number;
}

/**
 * Byte range of the scalar at logical position `index`, or null when
 * the index is out of range. A sequence truncated by the end of the
 * text is clipped to the bytes available.
 */
export function scalarSpan(bytes: Uint8Array, index: number): ByteSpan | null {
  if (index < 0) {
    return null;
  }

  let seen = -1;
  for (let i = 0; i < bytes.length; i++) {
    if (!isLeadByte(bytes[i])) continue;
    seen++;
    if (seen === index) {
      const end = Math.min(i + sequenceLength(bytes[i]), bytes.length);
      return { start: i, end };
    }
  }
  return null;
}

/**
 * Byte-wise ordering, shorter prefix first
 */
export function compareBytes(left: Uint8Array, right: Uint8Array): number {
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

export function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  return compareBytes(left, right) === 0;
}
