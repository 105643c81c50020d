import type { FontObject } from '../types/font';
import { lineHeight } from './text-layout';

export interface AtlasDescriptorOptions {
  fontName: string;
  imageFile: string;
  padding: number;
}

export interface AtlasGlyphEntry {
  codepoint: number;
  char: string;
  x: number;
  y: number;
  width: number;
  height: number;
  offsetX: number;
  offsetY: number;
  advanceX: number;
}

export interface AtlasDescriptor {
  fontName: string;
  baseSize: number;
  lineHeight: number;
  ascent: number;
  descent: number;
  atlas: { file: string; width: number; height: number; padding: number };
  glyphCount: number;
  glyphs: AtlasGlyphEntry[];
}

export function generateAtlasDescriptor(font: FontObject, options: AtlasDescriptorOptions): AtlasDescriptor {
  return {
    fontName: options.fontName,
    baseSize: font.baseSize,
    lineHeight: lineHeight(font),
    ascent: font.metrics?.ascent ?? 0,
    descent: font.metrics?.descent ?? 0,
    atlas: {
      file: options.imageFile,
      width: font.texture?.width ?? 0,
      height: font.texture?.height ?? 0,
      padding: options.padding,
    },
    glyphCount: font.glyphCount,
    glyphs: font.glyphs.map(({ glyph, rect }) => ({
      codepoint: glyph.codepoint,
      char: String.fromCodePoint(glyph.codepoint),
      x: rect.x,
      y: rect.y,
      width: rect.width,
      height: rect.height,
      offsetX: glyph.offsetX,
      offsetY: glyph.offsetY,
      advanceX: glyph.advanceX,
    })),
  };
}

/** AngelCode BMFont text descriptor for the atlas. */
export function generateBMFont(font: FontObject, options: AtlasDescriptorOptions): string {
  const { fontName, imageFile, padding } = options;
  const lines = [
    `info face="${fontName}" size=${font.baseSize} bold=0 italic=0 charset="" unicode=1 stretchH=100 smooth=1 aa=1 padding=${padding},${padding},${padding},${padding} spacing=0,0`,
    `common lineHeight=${lineHeight(font)} base=${Math.round(font.metrics?.ascent ?? font.baseSize)} scaleW=${font.texture?.width ?? 0} scaleH=${font.texture?.height ?? 0} pages=1 packed=0`,
    `page id=0 file="${imageFile}"`,
    `chars count=${font.glyphCount}`,
    ...font.glyphs.map(
      ({ glyph, rect }) =>
        `char id=${glyph.codepoint} x=${rect.x} y=${rect.y} width=${rect.width} height=${rect.height} xoffset=${glyph.offsetX} yoffset=${glyph.offsetY} xadvance=${glyph.advanceX} page=0 chnl=15`,
    ),
  ];

  return lines.join('\n') + '\n';
}
