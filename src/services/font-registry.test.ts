import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { FAKE_FONT_BYTES, FakeRasterizer } from '../testing/fake-rasterizer';
import { isFontReady } from './font-loader';
import { FontRegistry } from './font-registry';
import { MemoryTextureStore } from './texture-store';

describe('FontRegistry', () => {
  let dir: string;
  let fontA: string;
  let fontB: string;
  let broken: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'glyph-atlas-registry-'));
    fontA = path.join(dir, 'a.ttf');
    fontB = path.join(dir, 'b.ttf');
    await fs.writeFile(fontA, FAKE_FONT_BYTES);
    await fs.writeFile(fontB, FAKE_FONT_BYTES);
    broken = path.join(dir, 'broken.ttf');
    await fs.writeFile(broken, Uint8Array.of(1, 2, 3));
  });

  afterAll(async () => {
    await fs.remove(dir);
  });

  function setup() {
    const textures = new MemoryTextureStore();
    return { textures, registry: new FontRegistry(new FakeRasterizer(), textures) };
  }

  it('caches fonts by path and load options', async () => {
    const { textures, registry } = setup();

    const first = await registry.acquire(fontA, { fontSize: 32 });
    const again = await registry.acquire(fontA, { fontSize: 32 });
    const larger = await registry.acquire(fontA, { fontSize: 48 });

    expect(again).toBe(first);
    expect(larger).not.toBe(first);
    expect(registry.size).toBe(2);
    expect(textures.size).toBe(2);
  });

  it('releases every font loaded from a path', async () => {
    const { textures, registry } = setup();
    const font = await registry.acquire(fontA, { fontSize: 32 });
    await registry.acquire(fontA, { fontSize: 48 });
    await registry.acquire(fontB);

    expect(await registry.release(fontA)).toBe(2);
    expect(await registry.release(fontA)).toBe(0);
    expect(isFontReady(font)).toBe(false);
    expect(registry.size).toBe(1);
    expect(textures.size).toBe(1);
  });

  it('keeps the default font through releaseAll', async () => {
    const { textures, registry } = setup();
    const fallback = await registry.setDefault(fontB);
    await registry.acquire(fontA);

    expect(fallback?.ownsResources).toBe(false);
    expect(await registry.releaseAll()).toBe(1);
    expect(registry.getDefault()).toBe(fallback);
    expect(fallback && isFontReady(fallback)).toBe(true);
    expect(textures.size).toBe(1);
  });

  it('tears down the previous default when replaced', async () => {
    const { textures, registry } = setup();
    const previous = await registry.setDefault(fontA);
    const next = await registry.setDefault(fontB, { fontSize: 16 });

    expect(previous && isFontReady(previous)).toBe(false);
    expect(next && isFontReady(next)).toBe(true);
    expect(registry.getDefault()).toBe(next);
    expect(textures.size).toBe(1);
  });

  it('shares one load between concurrent requests for the same font', async () => {
    const { textures, registry } = setup();

    const [first, second] = await Promise.all([registry.acquire(fontA), registry.acquire(fontA)]);

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(textures.size).toBe(1);
    expect(await registry.releaseAll()).toBe(1);
    expect(textures.size).toBe(0);
  });

  it('unloads a font released while it is still loading', async () => {
    const { textures, registry } = setup();

    const pending = registry.acquire(fontA);
    expect(await registry.release(fontA)).toBe(1);

    expect(isFontReady(await pending)).toBe(false);
    expect(textures.size).toBe(0);
  });

  it('treats options spelled as their defaults as the same font', async () => {
    const { textures, registry } = setup();

    const implicit = await registry.acquire(fontA);
    const explicit = await registry.acquire(fontA, { fontSize: 32, mode: 'default', packing: 'row', padding: 2, filter: 'point', codepoints: [] });
    const filtered = await registry.acquire(fontA, { filter: 'bilinear' });

    expect(explicit).toBe(implicit);
    expect(filtered).not.toBe(implicit);
    expect(textures.size).toBe(2);
  });

  describe('when a new default fails to load', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('keeps the previous default', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { textures, registry } = setup();
      const previous = await registry.setDefault(fontA);

      const current = await registry.setDefault(broken);

      expect(current).toBe(previous);
      expect(registry.getDefault()).toBe(previous);
      expect(previous && isFontReady(previous)).toBe(true);
      expect(textures.size).toBe(1);
      expect(warn).toHaveBeenCalledWith(`[glyph-atlas] [${broken}] Default font not replaced`);
    });

    it('leaves no default when there was none', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { registry } = setup();

      expect(await registry.setDefault(broken)).toBeNull();
      expect(registry.getDefault()).toBeNull();
    });
  });
});
