import { DEFAULT_ATLAS_PADDING, DEFAULT_FONT_SIZE, DEFAULT_GLYPH_COUNT } from '../config/defaults';
import type { FontGlyph, FontLoadOptions, FontObject, TextureUploader } from '../types/font';
import type { FontRasterizer } from '../types/glyph';
import { cropBitmap, releaseBitmap } from '../utils/bitmap-utils';
import { logDebug, logError, logWarning } from '../utils/log';
import { getDefaultCodepoints } from '../utils/unicode-utils';
import { generateAtlas } from './atlas-packer';
import { readFontFile } from './file-handler';
import { extractGlyphs } from './glyph-extractor';

export interface FontLoaderDeps<THandle> {
  rasterizer: FontRasterizer<THandle>;
  textures: TextureUploader;
}

function unusableFont(baseSize: number): FontObject {
  return { baseSize, glyphCount: 0, glyphs: [], texture: null, metrics: null, unpacked: [], ownsResources: true };
}

/** Rasterize, pack and upload a font already held in memory. */
export function loadFontFromMemory<THandle>(fontBytes: Uint8Array, options: FontLoadOptions, deps: FontLoaderDeps<THandle>): FontObject {
  const { fontSize = DEFAULT_FONT_SIZE, mode = 'default', padding = DEFAULT_ATLAS_PADDING, packing = 'row', filter = 'point', shared = false } = options;
  const codepoints = options.codepoints && options.codepoints.length > 0 ? options.codepoints : getDefaultCodepoints(DEFAULT_GLYPH_COUNT);

  const extracted = extractGlyphs(deps.rasterizer, fontBytes, { fontSize, codepoints, mode });
  if (!extracted) return unusableFont(fontSize);

  const { atlas, rects, failed } = generateAtlas(extracted.glyphs, { fontSize, padding, packing });

  const glyphs: FontGlyph[] = extracted.glyphs.map((glyph, i) => {
    const rect = rects[i];
    // From here on the glyph image is a copy of its atlas cell, alpha included
    return { glyph: { ...glyph, image: cropBitmap(atlas, rect) }, rect };
  });

  const texture = deps.textures.upload(atlas);
  deps.textures.setFilter(texture, filter);
  releaseBitmap(atlas);

  logDebug(`Loaded font: ${glyphs.length} glyphs, base size ${fontSize}, atlas ${texture.width}x${texture.height}`);

  return {
    baseSize: fontSize,
    glyphCount: glyphs.length,
    glyphs,
    texture,
    metrics: { ascent: extracted.metrics.ascent, descent: extracted.metrics.descent, lineGap: extracted.metrics.lineGap },
    unpacked: failed.map((i) => extracted.glyphs[i].codepoint),
    ownsResources: !shared,
  };
}

export async function loadFont<THandle>(fontPath: string, options: FontLoadOptions, deps: FontLoaderDeps<THandle>): Promise<FontObject> {
  let fontBytes: Uint8Array;

  try {
    fontBytes = await readFontFile(fontPath);
  } catch (error) {
    logError(`[${fontPath}] Font file could not be opened: ${error}`);
    return unusableFont(options.fontSize ?? DEFAULT_FONT_SIZE);
  }

  const font = loadFontFromMemory(fontBytes, options, deps);
  if (!isFontReady(font)) {
    logWarning(`[${fontPath}] Font could not be loaded`);
  }

  return font;
}

export function isFontReady(font: FontObject): boolean {
  return font.glyphCount > 0 && font.texture !== null;
}

/**
 * Release glyph images, rectangles and texture together.
 * Shared fonts are left untouched; calling twice is harmless.
 */
export function unloadFont(font: FontObject, textures: TextureUploader): void {
  if (!font.ownsResources) return;

  for (const { glyph } of font.glyphs) {
    releaseBitmap(glyph.image);
  }
  if (font.texture) {
    textures.release(font.texture);
  }

  font.glyphs = [];
  font.glyphCount = 0;
  font.texture = null;
  logDebug('Unloaded font data');
}
