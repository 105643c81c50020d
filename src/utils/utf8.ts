import { MAX_CODEPOINT, REPLACEMENT_CODEPOINT } from '../config/defaults';

export interface DecodedCodepoint {
  codepoint: number;
  byteCount: number;
}

/*
    Char. number range  |        UTF-8 octet sequence
    --------------------+---------------------------------------------
    0000 0000-0000 007F | 0xxxxxxx
    0000 0080-0000 07FF | 110xxxxx 10xxxxxx
    0000 0800-0000 FFFF | 1110xxxx 10xxxxxx 10xxxxxx
    0001 0000-0010 FFFF | 11110xxx 10xxxxxx 10xxxxxx 10xxxxxx
*/

// The end of the buffer and NUL both terminate the string
function byteAt(bytes: Uint8Array, index: number): number {
  return index < bytes.length ? bytes[index] : 0;
}

function isContinuation(octet: number): boolean {
  return octet !== 0 && octet >> 6 === 2;
}

function fail(byteCount: number): DecodedCodepoint {
  return { codepoint: REPLACEMENT_CODEPOINT, byteCount };
}

/**
 * Decode the codepoint starting at `offset`.
 *
 * Malformed input yields '?' with `byteCount` covering only the bytes inspected
 * up to and including the offending one; callers resume right after them.
 */
export function decodeCodepoint(bytes: Uint8Array, offset = 0): DecodedCodepoint {
  const octet = byteAt(bytes, offset);

  if (octet <= 0x7f) {
    return { codepoint: octet, byteCount: 1 };
  }

  if ((octet & 0xe0) === 0xc0) {
    const octet1 = byteAt(bytes, offset + 1);
    if (!isContinuation(octet1)) return fail(2);

    // C0 and C1 could only encode overlong ASCII
    if (octet < 0xc2) return fail(1);

    return { codepoint: ((octet & 0x1f) << 6) | (octet1 & 0x3f), byteCount: 2 };
  }

  if ((octet & 0xf0) === 0xe0) {
    const octet1 = byteAt(bytes, offset + 1);
    if (!isContinuation(octet1)) return fail(2);

    const octet2 = byteAt(bytes, offset + 2);
    if (!isContinuation(octet2)) return fail(3);

    if ((octet === 0xe0 && octet1 < 0xa0) || (octet === 0xed && octet1 > 0x9f)) return fail(2);

    return { codepoint: ((octet & 0x0f) << 12) | ((octet1 & 0x3f) << 6) | (octet2 & 0x3f), byteCount: 3 };
  }

  if ((octet & 0xf8) === 0xf0) {
    if (octet > 0xf4) return fail(1);

    const octet1 = byteAt(bytes, offset + 1);
    if (!isContinuation(octet1)) return fail(2);

    const octet2 = byteAt(bytes, offset + 2);
    if (!isContinuation(octet2)) return fail(3);

    const octet3 = byteAt(bytes, offset + 3);
    if (!isContinuation(octet3)) return fail(4);

    if ((octet === 0xf0 && octet1 < 0x90) || (octet === 0xf4 && octet1 > 0x8f)) return fail(2);

    const codepoint = ((octet & 0x07) << 18) | ((octet1 & 0x3f) << 12) | ((octet2 & 0x3f) << 6) | (octet3 & 0x3f);
    return codepoint > MAX_CODEPOINT ? fail(4) : { codepoint, byteCount: 4 };
  }

  // Stray continuation byte or 0xF8..0xFF
  return fail(1);
}

export function encodeCodepoint(codepoint: number): Uint8Array {
  if (codepoint <= 0x7f) return Uint8Array.of(codepoint);
  if (codepoint <= 0x7ff) return Uint8Array.of(0xc0 | (codepoint >> 6), 0x80 | (codepoint & 0x3f));
  if (codepoint <= 0xffff) return Uint8Array.of(0xe0 | (codepoint >> 12), 0x80 | ((codepoint >> 6) & 0x3f), 0x80 | (codepoint & 0x3f));
  return Uint8Array.of(0xf0 | (codepoint >> 18), 0x80 | ((codepoint >> 12) & 0x3f), 0x80 | ((codepoint >> 6) & 0x3f), 0x80 | (codepoint & 0x3f));
}

const encoder = new TextEncoder();

export function textToBytes(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Length of the C-style string held in `bytes`: up to the first NUL or the end. */
export function byteStringLength(bytes: Uint8Array): number {
  const end = bytes.indexOf(0);
  return end === -1 ? bytes.length : end;
}

export function codepointsFromBytes(bytes: Uint8Array): number[] {
  const codepoints: number[] = [];
  const length = byteStringLength(bytes);

  for (let i = 0; i < length; ) {
    const { codepoint, byteCount } = decodeCodepoint(bytes, i);
    codepoints.push(codepoint);
    i += byteCount;
  }

  return codepoints;
}
