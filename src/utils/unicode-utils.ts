import { DEFAULT_FIRST_CHAR, DEFAULT_GLYPH_COUNT, MAX_CODEPOINT, MAX_RANGE_CODEPOINTS } from '../config/defaults';

const HEX_TOKEN = /^(0x|u\+)[0-9a-f]+$/i;
const DECIMAL_TOKEN = /^[0-9]+$/;

export function getDefaultCodepoints(count: number = DEFAULT_GLYPH_COUNT): number[] {
  return Array.from({ length: count }, (_, i) => DEFAULT_FIRST_CHAR + i);
}

/** Unique codepoints of `text`, in order of first appearance. */
export function codepointsFromText(text: string): number[] {
  const seen = new Set<number>();

  for (const char of text) {
    const codepoint = char.codePointAt(0);
    if (codepoint !== undefined) seen.add(codepoint);
  }

  return Array.from(seen);
}

function parseCodepoint(token: string): number {
  const value = HEX_TOKEN.test(token) ? parseInt(token.slice(2), 16) : DECIMAL_TOKEN.test(token) ? parseInt(token, 10) : NaN;

  if (!Number.isInteger(value) || value > MAX_CODEPOINT) {
    throw new Error(`Invalid codepoint: ${token}`);
  }

  return value;
}

/**
 * Parse a list such as `32-126,0x410-0x44F,U+20AC` into codepoints.
 * Duplicates are dropped, order is kept; at most MAX_RANGE_CODEPOINTS are accepted.
 */
export function parseCodepointRanges(ranges: string): number[] {
  const seen = new Set<number>();

  for (const part of ranges.split(',')) {
    const token = part.trim();
    if (!token) continue;

    const [startToken, endToken] = token.split('-').map((t) => t.trim());
    const start = parseCodepoint(startToken);
    const end = endToken === undefined ? start : parseCodepoint(endToken);

    if (end < start) {
      throw new Error(`Invalid codepoint range: ${token}`);
    }
    if (seen.size + (end - start + 1) > MAX_RANGE_CODEPOINTS) {
      throw new Error(`Too many codepoints requested: more than ${MAX_RANGE_CODEPOINTS} (at ${token})`);
    }

    for (let codepoint = start; codepoint <= end; codepoint++) {
      seen.add(codepoint);
    }
  }

  return Array.from(seen);
}

/** Codepoints named by tool input; an empty result means the default set. */
export function resolveCodepoints(characters?: string, ranges?: string): number[] {
  const fromText = characters ? codepointsFromText(characters) : [];
  const fromRanges = ranges ? parseCodepointRanges(ranges) : [];
  return Array.from(new Set([...fromText, ...fromRanges]));
}
