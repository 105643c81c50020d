import { LINE_SPACING_FACTOR, REPLACEMENT_CODEPOINT } from '../config/defaults';
import type { Rectangle, Vector2 } from '../types/bitmap';
import type { FontGlyph, FontObject } from '../types/font';
import { byteStringLength, decodeCodepoint, textToBytes } from '../utils/utf8';

const NEWLINE = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;

export type TextInput = string | Uint8Array;

/** One textured quad: `source` in the atlas, `dest` on screen. */
export interface DrawCommand {
  codepoint: number;
  index: number;
  source: Rectangle;
  dest: Rectangle;
}

/**
 * Index of `codepoint` in the font, falling back to the '?' glyph
 * (or the first glyph when the font has no '?').
 */
export function getGlyphIndex(font: FontObject, codepoint: number): number {
  let fallback = 0;

  for (let i = 0; i < font.glyphs.length; i++) {
    const glyphCodepoint = font.glyphs[i].glyph.codepoint;
    if (glyphCodepoint === codepoint) return i;
    if (glyphCodepoint === REPLACEMENT_CODEPOINT && fallback === 0) fallback = i;
  }

  return fallback;
}

/** Horizontal advance at base size. Glyphs without one advance by their ink box. */
export function glyphAdvance({ glyph, rect }: FontGlyph): number {
  return glyph.advanceX !== 0 ? glyph.advanceX : rect.width + glyph.offsetX;
}

export function lineHeight(font: FontObject): number {
  return font.baseSize * LINE_SPACING_FACTOR;
}

// Every undecodable byte becomes its own '?', so a failed decode only moves one byte
function forEachCodepoint(text: TextInput, visit: (codepoint: number) => void): void {
  const bytes = typeof text === 'string' ? textToBytes(text) : text;
  const length = byteStringLength(bytes);

  for (let i = 0; i < length; ) {
    const { codepoint, byteCount } = decodeCodepoint(bytes, i);
    visit(codepoint);
    i += codepoint === REPLACEMENT_CODEPOINT ? 1 : byteCount;
  }
}

/**
 * Size of `text` drawn at `fontSize` with `spacing` extra pixels between glyphs.
 * Lines are 1.5 × the base size apart; spacing is not scaled.
 */
export function measureText(font: FontObject, text: TextInput, fontSize: number, spacing: number): Vector2 {
  if (font.glyphCount === 0) return { x: 0, y: 0 };

  const scale = fontSize / font.baseSize;
  let lineWidth = 0;
  let lineChars = 0;
  let widest = 0;
  let widestChars = 0;
  let height = 0;
  let empty = true;

  const endLine = () => {
    if (lineWidth > widest || (lineWidth === widest && lineChars > widestChars)) {
      widest = lineWidth;
      widestChars = lineChars;
    }
    lineWidth = 0;
    lineChars = 0;
    height += lineHeight(font);
  };

  forEachCodepoint(text, (codepoint) => {
    empty = false;
    if (codepoint === NEWLINE) {
      endLine();
      return;
    }
    lineWidth += glyphAdvance(font.glyphs[getGlyphIndex(font, codepoint)]);
    lineChars++;
  });

  if (empty) return { x: 0, y: 0 };
  endLine();

  return {
    x: widest * scale + Math.max(0, widestChars - 1) * spacing,
    y: height * scale,
  };
}

/** Draw commands for `text` with its first line's top-left corner at `position`. */
export function layoutText(font: FontObject, text: TextInput, position: Vector2, fontSize: number, spacing: number): DrawCommand[] {
  if (font.glyphCount === 0) return [];

  const scale = fontSize / font.baseSize;
  const commands: DrawCommand[] = [];
  let penX = 0;
  let penY = 0;

  forEachCodepoint(text, (codepoint) => {
    if (codepoint === NEWLINE) {
      penX = 0;
      penY += lineHeight(font) * scale;
      return;
    }

    const index = getGlyphIndex(font, codepoint);
    const entry = font.glyphs[index];

    if (codepoint !== SPACE && codepoint !== TAB) {
      commands.push({
        codepoint,
        index,
        source: { ...entry.rect },
        dest: {
          x: position.x + penX + entry.glyph.offsetX * scale,
          y: position.y + penY + entry.glyph.offsetY * scale,
          width: entry.rect.width * scale,
          height: entry.rect.height * scale,
        },
      });
    }

    penX += glyphAdvance(entry) * scale + spacing;
  });

  return commands;
}
