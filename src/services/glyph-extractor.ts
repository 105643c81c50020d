import { BITMAP_ALPHA_THRESHOLD, DEFAULT_GLYPH_COUNT, SDF_CHAR_PADDING, SDF_ON_EDGE_VALUE, SDF_PIXEL_DIST_SCALE } from '../config/defaults';
import type { ExtractedFontData, FontRasterizer, GlyphRecord, RasterizedGlyph, RenderMode } from '../types/glyph';
import { binarize, createBitmap, emptyBitmap } from '../utils/bitmap-utils';
import { logDebug, logError } from '../utils/log';
import { getDefaultCodepoints } from '../utils/unicode-utils';

const SPACE = 32;

export interface ExtractGlyphsOptions {
  fontSize: number;
  codepoints?: number[];
  mode?: RenderMode;
}

function rasterize<THandle>(rasterizer: FontRasterizer<THandle>, handle: THandle, scale: number, codepoint: number, mode: RenderMode): RasterizedGlyph | null {
  if (mode !== 'sdf') {
    return rasterizer.codepointBitmap(handle, scale, codepoint);
  }

  // A distance field of whitespace carries no information
  if (codepoint === SPACE) return null;

  return rasterizer.codepointSdf(handle, scale, codepoint, SDF_CHAR_PADDING, SDF_ON_EDGE_VALUE, SDF_PIXEL_DIST_SCALE);
}

/**
 * Rasterize every requested codepoint at `fontSize` pixels.
 *
 * Returns null when the rasterizer rejects the font bytes.
 */
export function extractGlyphs<THandle>(rasterizer: FontRasterizer<THandle>, fontBytes: Uint8Array, options: ExtractGlyphsOptions): ExtractedFontData | null {
  const { fontSize, mode = 'default' } = options;
  const codepoints = options.codepoints && options.codepoints.length > 0 ? options.codepoints : getDefaultCodepoints(DEFAULT_GLYPH_COUNT);

  const handle = rasterizer.initialize(fontBytes);
  if (handle === null) {
    logError('Failed to init font: rasterizer rejected the font data');
    return null;
  }

  const scale = rasterizer.scaleForPixelHeight(handle, fontSize);
  const { ascent, descent, lineGap } = rasterizer.verticalMetrics(handle);
  // Ascent is the baseline: offsets become relative to the top of the line
  const baseline = Math.trunc(ascent * scale);

  const glyphs: GlyphRecord[] = codepoints.map((codepoint) => {
    const raster = rasterize(rasterizer, handle, scale, codepoint, mode);
    const image = raster && raster.width > 0 && raster.height > 0 ? createBitmap(raster.width, raster.height, 'grayscale', raster.data.slice(0, raster.width * raster.height)) : emptyBitmap();

    if (mode === 'bitmap') {
      binarize(image.data, BITMAP_ALPHA_THRESHOLD);
    }

    const offsetX = raster?.offsetX ?? 0;
    const offsetY = (raster?.offsetY ?? 0) + baseline;
    logDebug(`Glyph ${codepoint}: ${image.width}x${image.height} at ${offsetX},${offsetY}`);

    return {
      codepoint,
      image,
      offsetX,
      offsetY,
      advanceX: Math.trunc(rasterizer.horizontalAdvance(handle, codepoint) * scale),
    };
  });

  return {
    glyphs,
    metrics: {
      ascent: ascent * scale,
      descent: descent * scale,
      lineGap: lineGap * scale,
      scale,
    },
  };
}
