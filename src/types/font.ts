import type { Bitmap, Rectangle } from './bitmap';
import type { GlyphRecord, RenderMode, VerticalMetrics } from './glyph';

export type PackingMethod = 'row' | 'skyline';

export type TextureFilter = 'point' | 'bilinear' | 'trilinear';

export type PlacementRect = Rectangle;

export interface TextureHandle {
  id: number;
  width: number;
  height: number;
}

export interface TextureUploader {
  upload(bitmap: Bitmap): TextureHandle;
  setFilter(handle: TextureHandle, filter: TextureFilter): void;
  release(handle: TextureHandle): void;
}

/** A glyph and its place in the atlas; the pair never separates. */
export interface FontGlyph {
  glyph: GlyphRecord;
  rect: PlacementRect;
}

export interface FontObject {
  baseSize: number;
  glyphCount: number;
  glyphs: FontGlyph[];
  texture: TextureHandle | null;
  metrics: VerticalMetrics | null;
  /** Codepoints whose glyphs did not fit in the atlas. */
  unpacked: number[];
  /** Shared fonts (the registry default) are never torn down by unloadFont. */
  ownsResources: boolean;
}

export interface FontLoadOptions {
  fontSize?: number;
  codepoints?: number[];
  mode?: RenderMode;
  padding?: number;
  packing?: PackingMethod;
  filter?: TextureFilter;
  shared?: boolean;
}

export interface AtlasExportConfig {
  fontName: string;
  formats: AtlasExportFormat[];
  outputDir: string;
}

export type AtlasExportFormat = 'png' | 'json' | 'fnt';
