/**
 * UTF-8 boundaries, validation and decoding over raw bytes.
 *
 * Validation follows RFC 3629: no overlong forms, no surrogates, nothing
 * above U+10FFFF.
 */

/** Sequence length announced by a leading byte, or 0 if it cannot lead. */
export function utf8CharLen(first: number): number {
  if (first < 0x80) return 1;
  if (first < 0xc2) return 0;
  if (first < 0xe0) return 2;
  if (first < 0xf0) return 3;
  if (first < 0xf5) return 4;
  return 0;
}

export function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/** True if `index` does not fall inside a multi-byte sequence. */
export function isCharBoundary(bytes: Uint8Array, index: number): boolean {
  if (index <= 0 || index >= bytes.length) return true;
  return !isContinuation(bytes[index]);
}

/** Allowed range of the second byte for a given leading byte. */
function secondByteRange(first: number): [number, number] {
  switch (first) {
    case 0xe0:
      return [0xa0, 0xbf];
    case 0xed:
      return [0x80, 0x9f];
    case 0xf0:
      return [0x90, 0xbf];
    case 0xf4:
      return [0x80, 0x8f];
    default:
      return [0x80, 0xbf];
  }
}

export type Utf8Check =
  | { readonly valid: true }
  | {
      readonly valid: false;
      /** Offset of the first byte of the bad sequence. */
      readonly offset: number;
      /** Bytes the sequence still needs if it was only cut short by the end of input. */
      readonly missing: number | null;
    };

/** Validate `bytes` as UTF-8. */
export function checkUtf8(bytes: Uint8Array): Utf8Check {
  let i = 0;
  while (i < bytes.length) {
    const first = bytes[i];
    if (first < 0x80) {
      i++;
      continue;
    }
    const len = utf8CharLen(first);
    if (len === 0) return { valid: false, offset: i, missing: null };

    const [lo, hi] = secondByteRange(first);
    for (let k = 1; k < len; k++) {
      const at = i + k;
      if (at >= bytes.length) {
        return { valid: false, offset: i, missing: len - k };
      }
      const b = bytes[at];
      const ok = k === 1 ? b >= lo && b <= hi : isContinuation(b);
      if (!ok) return { valid: false, offset: i, missing: null };
    }
    i += len;
  }
  return { valid: true };
}

/**
 * Decode the code point starting at `at` in already validated bytes.
 * Returns the code point and its encoded length.
 */
export function decodeAt(bytes: Uint8Array, at: number): { codePoint: number; len: number } {
  const first = bytes[at];
  const len = utf8CharLen(first);
  switch (len) {
    case 2:
      return { codePoint: ((first & 0x1f) << 6) | (bytes[at + 1] & 0x3f), len };
    case 3:
      return {
        codePoint: ((first & 0x0f) << 12) | ((bytes[at + 1] & 0x3f) << 6) | (bytes[at + 2] & 0x3f),
        len,
      };
    case 4:
      return {
        codePoint:
          ((first & 0x07) << 18) |
          ((bytes[at + 1] & 0x3f) << 12) |
          ((bytes[at + 2] & 0x3f) << 6) |
          (bytes[at + 3] & 0x3f),
        len,
      };
    default:
      return { codePoint: first, len: 1 };
  }
}

const encoder = new TextEncoder();

export function encodeUtf8(s: string): Uint8Array {
  return encoder.encode(s);
}
