import { afterEach, describe, it, expect, vi } from 'vitest';
import { FAKE_FONT_BYTES, FakeRasterizer, fakeGlyphShape } from '../testing/fake-rasterizer';
import { extractGlyphs } from './glyph-extractor';

describe('extractGlyphs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rasterizes printable ASCII when no codepoints are given', () => {
    const data = extractGlyphs(new FakeRasterizer(), FAKE_FONT_BYTES, { fontSize: 32 });

    expect(data).not.toBeNull();
    expect(data?.glyphs).toHaveLength(95);
    expect(data?.glyphs[0].codepoint).toBe(32);
    expect(data?.glyphs[94].codepoint).toBe(126);
    for (const glyph of data?.glyphs ?? []) {
      expect(glyph.image.width).toBeGreaterThan(0);
      expect(glyph.image.height).toBeGreaterThan(0);
    }
  });

  it('measures offsets from the top of the line', () => {
    const data = extractGlyphs(new FakeRasterizer(), FAKE_FONT_BYTES, { fontSize: 32, codepoints: [65] });
    const glyph = data?.glyphs[0];

    expect(glyph?.offsetX).toBe(1);
    // Raster offset -20 below a baseline 24 pixels down
    expect(glyph?.offsetY).toBe(4);
    expect(glyph?.advanceX).toBe(6);
    expect(glyph?.image.width).toBe(4);
    expect(glyph?.image.height).toBe(20);
    expect(glyph?.image.data[0]).toBe(fakeGlyphShape(65).fill);
  });

  it('scales metrics and truncates advances', () => {
    const data = extractGlyphs(new FakeRasterizer(), FAKE_FONT_BYTES, { fontSize: 16, codepoints: [65] });

    expect(data?.metrics).toEqual({ ascent: 12, descent: -4, lineGap: 2, scale: 0.5 });
    expect(data?.glyphs[0].offsetY).toBe(-8);
    expect(data?.glyphs[0].advanceX).toBe(3);
  });

  it('thresholds coverage in bitmap mode', () => {
    const data = extractGlyphs(new FakeRasterizer(), FAKE_FONT_BYTES, { fontSize: 32, codepoints: [32, 65], mode: 'bitmap' });

    // Fill 72 for space, 105 for 'A'
    expect(new Set(data?.glyphs[0].image.data)).toEqual(new Set([0]));
    expect(new Set(data?.glyphs[1].image.data)).toEqual(new Set([255]));
  });

  it('skips space and pads the rest in sdf mode', () => {
    const rasterizer = new FakeRasterizer();
    const data = extractGlyphs(rasterizer, FAKE_FONT_BYTES, { fontSize: 32, codepoints: [32, 65], mode: 'sdf' });

    expect(rasterizer.sdfCalls).toEqual([65]);
    expect(rasterizer.bitmapCalls).toEqual([]);

    const [space, a] = data?.glyphs ?? [];
    expect(space.image.width).toBe(0);
    expect(space.image.height).toBe(0);
    expect(space.advanceX).toBe(8);
    expect(a.image.width).toBe(12);
    expect(a.image.height).toBe(28);
    expect(a.offsetX).toBe(-3);
    expect(a.offsetY).toBe(0);
    expect(a.image.data[0]).toBe(128);
  });

  it('keeps glyphs the font cannot draw as empty records', () => {
    const rasterizer = new FakeRasterizer((codepoint) => (codepoint === 66 ? null : fakeGlyphShape(codepoint)));
    const data = extractGlyphs(rasterizer, FAKE_FONT_BYTES, { fontSize: 32, codepoints: [65, 66] });
    const missing = data?.glyphs[1];

    expect(missing?.codepoint).toBe(66);
    expect(missing?.image.width).toBe(0);
    expect(missing?.offsetX).toBe(0);
    expect(missing?.offsetY).toBe(24);
    expect(missing?.advanceX).toBe(0);
  });

  it('returns null and logs when the font bytes are rejected', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const data = extractGlyphs(new FakeRasterizer(), Uint8Array.of(1, 2, 3), { fontSize: 32 });

    expect(data).toBeNull();
    expect(error).toHaveBeenCalledWith('[glyph-atlas] Failed to init font: rasterizer rejected the font data');
  });
});
