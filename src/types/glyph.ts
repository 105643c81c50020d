import type { Bitmap } from './bitmap';

export type RenderMode = 'default' | 'bitmap' | 'sdf';

export interface GlyphRecord {
  codepoint: number;
  image: Bitmap;
  offsetX: number;
  offsetY: number;
  advanceX: number;
}

/** Single-channel coverage (or distance field) as produced by a rasterizer. */
export interface RasterizedGlyph {
  data: Uint8Array;
  width: number;
  height: number;
  offsetX: number;
  offsetY: number;
}

/** Font-wide metrics. Raw font units from a rasterizer, pixels once extracted. */
export interface VerticalMetrics {
  ascent: number;
  descent: number;
  lineGap: number;
}

export interface FontInfo {
  familyName: string;
  glyphCount: number;
}

export interface FontRasterizer<THandle> {
  initialize(fontBytes: Uint8Array): THandle | null;
  /** Family name and the number of glyphs the font file defines. */
  fontInfo(handle: THandle): FontInfo;
  scaleForPixelHeight(handle: THandle, pixelHeight: number): number;
  verticalMetrics(handle: THandle): VerticalMetrics;
  codepointBitmap(handle: THandle, scale: number, codepoint: number): RasterizedGlyph | null;
  codepointSdf(handle: THandle, scale: number, codepoint: number, padding: number, onEdgeValue: number, pixelDistScale: number): RasterizedGlyph | null;
  /** Advance width in raw font units. */
  horizontalAdvance(handle: THandle, codepoint: number): number;
}

export interface ExtractedFontData {
  glyphs: GlyphRecord[];
  metrics: VerticalMetrics & { scale: number };
}
