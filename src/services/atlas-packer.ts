import { ATLAS_AREA_FACTOR, DEFAULT_ATLAS_PADDING } from '../config/defaults';
import type { Bitmap } from '../types/bitmap';
import type { PackingMethod, PlacementRect } from '../types/font';
import type { GlyphRecord } from '../types/glyph';
import { copyBitmapInto, createBitmap, grayscaleToGrayAlpha } from '../utils/bitmap-utils';
import { logDebug, logWarning } from '../utils/log';
import { SkylinePacker, type PackRect } from './skyline-packer';

export interface PackResult {
  /** Top-left corner of each glyph's padded footprint, parallel to the input. */
  placements: Array<{ x: number; y: number } | null>;
  /** Indices of glyphs that did not fit. */
  failed: number[];
}

export interface GlyphPacker {
  readonly method: PackingMethod;
  pack(glyphs: readonly GlyphRecord[], atlasSize: number, padding: number, fontSize: number): PackResult;
}

/**
 * Left to right along fixed rows, wrapping to a new row at the right edge.
 * Once a row would run past the bottom edge every remaining glyph is dropped.
 */
export class RowPacker implements GlyphPacker {
  readonly method = 'row';

  pack(glyphs: readonly GlyphRecord[], atlasSize: number, padding: number, fontSize: number): PackResult {
    const placements: PackResult['placements'] = [];
    const failed: number[] = [];
    let offsetX = padding;
    let offsetY = padding;
    let rowHeight = fontSize;
    let stopped = false;

    for (let i = 0; i < glyphs.length; i++) {
      const { width, height } = glyphs[i].image;

      if (!stopped && offsetX > padding && offsetX + width + padding > atlasSize) {
        // Rows step by the tallest glyph when it exceeds fontSize: distance-field
        // glyphs carry extra padding and would overlap the next row otherwise
        offsetX = padding;
        offsetY += rowHeight + 2 * padding;
        rowHeight = fontSize;
      }

      if (stopped || offsetX + width + padding > atlasSize || offsetY + height + padding > atlasSize) {
        stopped = true;
        placements.push(null);
        failed.push(i);
        continue;
      }

      placements.push({ x: offsetX - padding, y: offsetY - padding });
      offsetX += width + 2 * padding;
      rowHeight = Math.max(rowHeight, height);
    }

    return { placements, failed };
  }
}

export class SkylineGlyphPacker implements GlyphPacker {
  readonly method = 'skyline';

  pack(glyphs: readonly GlyphRecord[], atlasSize: number, padding: number): PackResult {
    const packer = new SkylinePacker(atlasSize, atlasSize);
    const rects: PackRect[] = glyphs.map((glyph, id) => ({
      id,
      width: glyph.image.width + 2 * padding,
      height: glyph.image.height + 2 * padding,
      x: 0,
      y: 0,
      wasPacked: false,
    }));

    packer.pack(rects);

    const failed = rects.filter((rect) => !rect.wasPacked).map((rect) => rect.id);
    return {
      placements: rects.map((rect) => (rect.wasPacked ? { x: rect.x, y: rect.y } : null)),
      failed,
    };
  }
}

export function createPacker(method: PackingMethod): GlyphPacker {
  switch (method) {
    case 'row':
      return new RowPacker();
    case 'skyline':
      return new SkylineGlyphPacker();
  }
}

/** Next power of two at or above 1.3 × the side of a square holding every padded glyph. */
export function atlasSizeFor(glyphs: readonly GlyphRecord[], padding: number): number {
  let requiredArea = 0;
  for (const glyph of glyphs) {
    requiredArea += (glyph.image.width + 2 * padding) * (glyph.image.height + 2 * padding);
  }

  const guessSize = Math.sqrt(requiredArea) * ATLAS_AREA_FACTOR;
  if (guessSize <= 1) return 1;

  return 2 ** Math.ceil(Math.log2(guessSize));
}

export interface GenerateAtlasOptions {
  fontSize: number;
  padding?: number;
  packing?: PackingMethod;
}

export interface GeneratedAtlas {
  atlas: Bitmap;
  rects: PlacementRect[];
  failed: number[];
}

export function generateAtlas(glyphs: readonly GlyphRecord[], options: GenerateAtlasOptions): GeneratedAtlas {
  const { fontSize, padding = DEFAULT_ATLAS_PADDING, packing = 'row' } = options;
  const size = atlasSizeFor(glyphs, padding);
  const packer = createPacker(packing);
  const gray = createBitmap(size, size, 'grayscale');

  logDebug(`Packing ${glyphs.length} glyphs into ${size}x${size} (${packer.method})`);
  const { placements, failed } = packer.pack(glyphs, size, padding, fontSize);

  const rects = glyphs.map((glyph, i): PlacementRect => {
    const placement = placements[i];
    if (!placement) return { x: 0, y: 0, width: 0, height: 0 };

    const x = placement.x + padding;
    const y = placement.y + padding;
    copyBitmapInto(glyph.image, gray, x, y);
    return { x, y, width: glyph.image.width, height: glyph.image.height };
  });

  if (failed.length > 0) {
    const codepoints = failed.map((i) => glyphs[i].codepoint).join(', ');
    logWarning(`${failed.length} glyph(s) could not be packed into a ${size}x${size} atlas: ${codepoints}`);
  }

  return { atlas: grayscaleToGrayAlpha(gray), rects, failed };
}
