export const DEFAULT_FONT_SIZE = 32;
export const DEFAULT_FIRST_CHAR = 32;
export const DEFAULT_GLYPH_COUNT = 95;
export const DEFAULT_ATLAS_PADDING = 2;

export const SDF_CHAR_PADDING = 4;
export const SDF_ON_EDGE_VALUE = 128;
export const SDF_PIXEL_DIST_SCALE = 64;

export const BITMAP_ALPHA_THRESHOLD = 80;

// Fixed line spacing, in multiples of the font base size
export const LINE_SPACING_FACTOR = 1.5;

export const ATLAS_AREA_FACTOR = 1.3;

// '?' stands in for undecodable bytes and for codepoints missing from a font
export const REPLACEMENT_CODEPOINT = 0x3f;
export const MAX_CODEPOINT = 0x10ffff;

// Upper bound on the glyph set one range list may request
export const MAX_RANGE_CODEPOINTS = 0x10000;
