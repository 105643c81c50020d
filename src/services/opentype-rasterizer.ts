import opentype from 'opentype.js';
import type { Font, Glyph } from 'opentype.js';
import type { FontInfo, FontRasterizer, RasterizedGlyph, VerticalMetrics } from '../types/glyph';

interface Point {
  x: number;
  y: number;
}

interface Edge {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  winding: 1 | -1;
}

interface GlyphOutline {
  /** Non-horizontal edges, the ones a scanline can cross. */
  edges: Edge[];
  /** Every outline segment, for distance queries. */
  segments: Edge[];
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

const CURVE_SEGMENTS = 12;
const SUBSAMPLES = 4;

function glyphFor(font: Font, codepoint: number): Glyph {
  return font.charToGlyph(String.fromCodePoint(codepoint));
}

// Flattened outline in pixel space, y growing downwards from the baseline
function outlineFor(font: Font, scale: number, codepoint: number): GlyphOutline | null {
  const path = glyphFor(font, codepoint).getPath(0, 0, scale * font.unitsPerEm);
  const contours: Point[][] = [];
  let contour: Point[] = [];
  let pen: Point = { x: 0, y: 0 };

  const closeContour = () => {
    if (contour.length > 2) contours.push(contour);
    contour = [];
  };

  for (const command of path.commands) {
    switch (command.type) {
      case 'M':
        closeContour();
        pen = { x: command.x, y: command.y };
        contour.push(pen);
        break;
      case 'L':
        pen = { x: command.x, y: command.y };
        contour.push(pen);
        break;
      case 'Q': {
        const start = pen;
        for (let i = 1; i <= CURVE_SEGMENTS; i++) {
          const t = i / CURVE_SEGMENTS;
          const mt = 1 - t;
          contour.push({
            x: mt * mt * start.x + 2 * mt * t * command.x1 + t * t * command.x,
            y: mt * mt * start.y + 2 * mt * t * command.y1 + t * t * command.y,
          });
        }
        pen = { x: command.x, y: command.y };
        break;
      }
      case 'C': {
        const start = pen;
        for (let i = 1; i <= CURVE_SEGMENTS; i++) {
          const t = i / CURVE_SEGMENTS;
          const mt = 1 - t;
          contour.push({
            x: mt * mt * mt * start.x + 3 * mt * mt * t * command.x1 + 3 * mt * t * t * command.x2 + t * t * t * command.x,
            y: mt * mt * mt * start.y + 3 * mt * mt * t * command.y1 + 3 * mt * t * t * command.y2 + t * t * t * command.y,
          });
        }
        pen = { x: command.x, y: command.y };
        break;
      }
      case 'Z':
        closeContour();
        break;
    }
  }
  closeContour();

  const edges: Edge[] = [];
  const segments: Edge[] = [];
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const points of contours) {
    for (let i = 0; i < points.length; i++) {
      const a = points[i];
      const b = points[(i + 1) % points.length];
      minX = Math.min(minX, a.x);
      minY = Math.min(minY, a.y);
      maxX = Math.max(maxX, a.x);
      maxY = Math.max(maxY, a.y);
      if (a.x === b.x && a.y === b.y) continue;
      const edge: Edge = { x0: a.x, y0: a.y, x1: b.x, y1: b.y, winding: b.y > a.y ? 1 : -1 };
      segments.push(edge);
      if (a.y !== b.y) edges.push(edge);
    }
  }

  return edges.length > 0 ? { edges, segments, minX, minY, maxX, maxY } : null;
}

function crossings(edges: Edge[], y: number): Array<{ x: number; winding: number }> {
  const hits: Array<{ x: number; winding: number }> = [];

  for (const edge of edges) {
    const top = Math.min(edge.y0, edge.y1);
    const bottom = Math.max(edge.y0, edge.y1);
    if (y < top || y >= bottom) continue;
    const t = (y - edge.y0) / (edge.y1 - edge.y0);
    hits.push({ x: edge.x0 + t * (edge.x1 - edge.x0), winding: edge.winding });
  }

  return hits.sort((a, b) => a.x - b.x);
}

function addSpan(row: Float32Array, from: number, to: number): void {
  const start = Math.max(0, from);
  const end = Math.min(row.length, to);
  if (end <= start) return;

  const first = Math.floor(start);
  const last = Math.floor(end);
  if (first === last) {
    row[first] += end - start;
    return;
  }

  row[first] += first + 1 - start;
  for (let x = first + 1; x < last; x++) row[x] += 1;
  if (last < row.length) row[last] += end - last;
}

/** Non-zero winding coverage of `outline` over a box whose top-left pixel is (originX, originY). */
function rasterizeCoverage(outline: GlyphOutline, originX: number, originY: number, width: number, height: number): Uint8Array {
  const data = new Uint8Array(width * height);
  const row = new Float32Array(width);

  for (let py = 0; py < height; py++) {
    row.fill(0);

    for (let s = 0; s < SUBSAMPLES; s++) {
      const y = originY + py + (s + 0.5) / SUBSAMPLES;
      let winding = 0;
      let spanStart = 0;

      for (const hit of crossings(outline.edges, y)) {
        const wasInside = winding !== 0;
        winding += hit.winding;
        if (!wasInside && winding !== 0) spanStart = hit.x;
        else if (wasInside && winding === 0) addSpan(row, spanStart - originX, hit.x - originX);
      }
    }

    for (let px = 0; px < width; px++) {
      data[py * width + px] = Math.round(Math.min(1, row[px] / SUBSAMPLES) * 255);
    }
  }

  return data;
}

function distanceToSegment(px: number, py: number, edge: Edge): number {
  const dx = edge.x1 - edge.x0;
  const dy = edge.y1 - edge.y0;
  const t = Math.max(0, Math.min(1, ((px - edge.x0) * dx + (py - edge.y0) * dy) / (dx * dx + dy * dy)));
  return Math.hypot(px - (edge.x0 + t * dx), py - (edge.y0 + t * dy));
}

function windingAt(edges: Edge[], x: number, y: number): number {
  let winding = 0;
  for (const hit of crossings(edges, y)) {
    if (hit.x > x) winding += hit.winding;
  }
  return winding;
}

export interface OpentypeFontHandle {
  font: Font;
}

/** Rasterizer backed by opentype.js outlines. */
export class OpentypeRasterizer implements FontRasterizer<OpentypeFontHandle> {
  initialize(fontBytes: Uint8Array): OpentypeFontHandle | null {
    try {
      const buffer = fontBytes.buffer.slice(fontBytes.byteOffset, fontBytes.byteOffset + fontBytes.byteLength);
      const font = opentype.parse(buffer);
      return font.unitsPerEm > 0 ? { font } : null;
    } catch {
      // Unparseable data is reported to the caller as a null handle
      return null;
    }
  }

  fontInfo({ font }: OpentypeFontHandle): FontInfo {
    return { familyName: font.names.fontFamily?.en || 'Unknown', glyphCount: font.glyphs.length };
  }

  scaleForPixelHeight({ font }: OpentypeFontHandle, pixelHeight: number): number {
    const height = font.ascender - font.descender;
    return height > 0 ? pixelHeight / height : pixelHeight / font.unitsPerEm;
  }

  verticalMetrics({ font }: OpentypeFontHandle): VerticalMetrics {
    const lineGap: unknown = font.tables.hhea?.lineGap;
    return {
      ascent: font.ascender,
      descent: font.descender,
      lineGap: typeof lineGap === 'number' ? lineGap : 0,
    };
  }

  codepointBitmap({ font }: OpentypeFontHandle, scale: number, codepoint: number): RasterizedGlyph | null {
    const outline = outlineFor(font, scale, codepoint);
    if (!outline) return null;

    const offsetX = Math.floor(outline.minX);
    const offsetY = Math.floor(outline.minY);
    const width = Math.ceil(outline.maxX) - offsetX;
    const height = Math.ceil(outline.maxY) - offsetY;
    if (width <= 0 || height <= 0) return null;

    return { data: rasterizeCoverage(outline, offsetX, offsetY, width, height), width, height, offsetX, offsetY };
  }

  codepointSdf({ font }: OpentypeFontHandle, scale: number, codepoint: number, padding: number, onEdgeValue: number, pixelDistScale: number): RasterizedGlyph | null {
    const outline = outlineFor(font, scale, codepoint);
    if (!outline) return null;

    const offsetX = Math.floor(outline.minX) - padding;
    const offsetY = Math.floor(outline.minY) - padding;
    const width = Math.ceil(outline.maxX) + padding - offsetX;
    const height = Math.ceil(outline.maxY) + padding - offsetY;
    const data = new Uint8Array(width * height);

    for (let py = 0; py < height; py++) {
      const y = offsetY + py + 0.5;
      for (let px = 0; px < width; px++) {
        const x = offsetX + px + 0.5;
        let distance = Infinity;
        for (const edge of outline.segments) {
          distance = Math.min(distance, distanceToSegment(x, y, edge));
        }
        const signed = windingAt(outline.edges, x, y) !== 0 ? distance : -distance;
        data[py * width + px] = Math.max(0, Math.min(255, Math.round(onEdgeValue + pixelDistScale * signed)));
      }
    }

    return { data, width, height, offsetX, offsetY };
  }

  horizontalAdvance({ font }: OpentypeFontHandle, codepoint: number): number {
    return glyphFor(font, codepoint).advanceWidth ?? 0;
  }
}
