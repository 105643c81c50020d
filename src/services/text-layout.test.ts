import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import type { FontGlyph, FontObject } from '../types/font';
import { createBitmap } from '../utils/bitmap-utils';
import { FAKE_FONT_BYTES, FakeRasterizer } from '../testing/fake-rasterizer';
import { loadFontFromMemory } from './font-loader';
import { getGlyphIndex, glyphAdvance, layoutText, lineHeight, measureText } from './text-layout';
import { MemoryTextureStore } from './texture-store';

function fakeFont(codepoints?: number[]): FontObject {
  return loadFontFromMemory(FAKE_FONT_BYTES, { codepoints }, { rasterizer: new FakeRasterizer(), textures: new MemoryTextureStore() });
}

// Advances at size 32: H 8, i 6, W 8, o 7, r 10, l 9, d 6, A 6, B 7, ? 9, space 8
describe('text layout', () => {
  let font: FontObject;

  beforeAll(() => {
    font = fakeFont();
  });

  describe('getGlyphIndex', () => {
    it('finds glyphs by codepoint', () => {
      expect(getGlyphIndex(font, 65)).toBe(33);
    });

    it("falls back to '?'", () => {
      expect(getGlyphIndex(font, 0x20ac)).toBe(31);
      expect(font.glyphs[31].glyph.codepoint).toBe(0x3f);
    });

    it("falls back to the first glyph without a '?'", () => {
      expect(getGlyphIndex(fakeFont([65, 66]), 0x20ac)).toBe(0);
    });
  });

  describe('glyphAdvance', () => {
    it('uses the advance when there is one', () => {
      expect(glyphAdvance(font.glyphs[33])).toBe(6);
    });

    it('falls back to the ink box plus its offset', () => {
      const entry: FontGlyph = {
        glyph: { codepoint: 1, image: createBitmap(0, 0), offsetX: 1, offsetY: 0, advanceX: 0 },
        rect: { x: 0, y: 0, width: 4, height: 4 },
      };
      expect(glyphAdvance(entry)).toBe(5);
    });
  });

  it('spaces lines 1.5 x the base size apart', () => {
    expect(lineHeight(font)).toBe(48);
  });

  describe('measureText', () => {
    it('measures the widest line and counts every line', () => {
      expect(measureText(font, 'Hi\nWorld', 32, 0)).toEqual({ x: 40, y: 96 });
    });

    it('scales with the requested size', () => {
      expect(measureText(font, 'Hi\nWorld', 64, 0)).toEqual({ x: 80, y: 192 });
    });

    it('adds spacing between the characters of the widest line', () => {
      expect(measureText(font, 'Hi\nWorld', 32, 2)).toEqual({ x: 48, y: 96 });
    });

    it('is zero for empty text', () => {
      expect(measureText(font, '', 32, 0)).toEqual({ x: 0, y: 0 });
      expect(measureText(font, Uint8Array.of(0, 65), 32, 0)).toEqual({ x: 0, y: 0 });
    });

    it('stops at an embedded NUL', () => {
      expect(measureText(font, 'A\u0000B', 32, 0)).toEqual({ x: 6, y: 48 });
    });

    it("counts one '?' for each undecodable byte", () => {
      expect(measureText(font, Uint8Array.of(0x41, 0xe0, 0x9f, 0x80, 0x42), 32, 0)).toEqual({ x: 40, y: 48 });
    });
  });

  describe('layoutText', () => {
    it('places glyphs at the pen plus their offsets', () => {
      const commands = layoutText(font, 'Hi', { x: 10, y: 20 }, 32, 0);

      expect(commands).toHaveLength(2);
      expect(commands[0]).toEqual({
        codepoint: 72,
        index: 40,
        source: font.glyphs[40].rect,
        dest: { x: 11, y: 24, width: 6, height: 20 },
      });
      expect(commands[1].dest.x).toBe(19);
    });

    it('scales offsets, sizes and advances', () => {
      const commands = layoutText(font, 'Hi', { x: 0, y: 0 }, 64, 0);

      expect(commands[0].dest).toEqual({ x: 2, y: 8, width: 12, height: 40 });
      expect(commands[1].dest.x).toBe(18);
    });

    it('advances over blanks without drawing them', () => {
      const commands = layoutText(font, 'A B', { x: 0, y: 0 }, 32, 0);

      expect(commands.map((c) => c.codepoint)).toEqual([65, 66]);
      expect(commands[1].dest.x).toBe(15);
      expect(layoutText(font, 'A\tB', { x: 0, y: 0 }, 32, 0)).toHaveLength(2);
    });

    it('starts a new line at the left edge', () => {
      const commands = layoutText(font, 'A\nB', { x: 0, y: 0 }, 32, 0);
      expect(commands[1].dest).toMatchObject({ x: 1, y: 52 });
    });

    it("draws missing characters with the '?' glyph", () => {
      const [command] = layoutText(font, '€', { x: 0, y: 0 }, 32, 0);
      expect(command.codepoint).toBe(0x20ac);
      expect(command.index).toBe(31);
    });

    it("draws a '?' for each undecodable byte", () => {
      const commands = layoutText(font, Uint8Array.of(0x41, 0xe0, 0x9f, 0x80, 0x42), { x: 0, y: 0 }, 32, 0);
      expect(commands.map((c) => c.codepoint)).toEqual([65, 63, 63, 63, 66]);
    });

    it('ends where measureText says the line ends', () => {
      const position = { x: 5, y: 7 };
      const scale = 48 / 32;
      const commands = layoutText(font, 'Hello', position, 48, 1.5);
      const last = commands[commands.length - 1];
      const entry = font.glyphs[last.index];

      const end = last.dest.x - position.x - entry.glyph.offsetX * scale + glyphAdvance(entry) * scale;
      expect(end).toBeCloseTo(measureText(font, 'Hello', 48, 1.5).x);
    });
  });

  describe('unusable fonts', () => {
    beforeAll(() => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterAll(() => {
      vi.restoreAllMocks();
    });

    it('measure and draw nothing', () => {
      const broken = loadFontFromMemory(Uint8Array.of(1), {}, { rasterizer: new FakeRasterizer(), textures: new MemoryTextureStore() });

      expect(measureText(broken, 'Hi', 32, 0)).toEqual({ x: 0, y: 0 });
      expect(layoutText(broken, 'Hi', { x: 0, y: 0 }, 32, 0)).toEqual([]);
    });
  });
});
