import { DEFAULT_ATLAS_PADDING, DEFAULT_FONT_SIZE } from '../config/defaults';
import type { FontLoadOptions, FontObject, TextureUploader } from '../types/font';
import type { FontRasterizer } from '../types/glyph';
import { logDebug, logWarning } from '../utils/log';
import { isFontReady, loadFont, unloadFont, type FontLoaderDeps } from './font-loader';

// Options left out and options spelled as their defaults load the same font
function cacheKey(fontPath: string, options: FontLoadOptions): string {
  const { fontSize = DEFAULT_FONT_SIZE, mode = 'default', packing = 'row', padding = DEFAULT_ATLAS_PADDING, filter = 'point', codepoints = [] } = options;
  return [fontPath, fontSize, mode, packing, padding, filter, codepoints.join(',')].join('|');
}

interface RegistryEntry {
  fontPath: string;
  /** Stored before the load finishes so concurrent callers share one load. */
  font: Promise<FontObject>;
}

/**
 * Loaded fonts keyed by file and load options. The default font is shared:
 * it is handed out to every caller and survives `releaseAll`.
 */
export class FontRegistry<THandle> {
  private readonly fonts = new Map<string, RegistryEntry>();
  private defaultFont: FontObject | null = null;
  private readonly deps: FontLoaderDeps<THandle>;

  constructor(rasterizer: FontRasterizer<THandle>, textures: TextureUploader) {
    this.deps = { rasterizer, textures };
  }

  acquire(fontPath: string, options: FontLoadOptions = {}): Promise<FontObject> {
    const key = cacheKey(fontPath, options);
    const cached = this.fonts.get(key);
    if (cached) return cached.font;

    const font = loadFont(fontPath, { ...options, shared: false }, this.deps);
    this.fonts.set(key, { fontPath, font });
    logDebug(`Registered font ${key}`);
    return font;
  }

  /**
   * Load `fontPath` as the shared default. A font that fails to load leaves
   * the current default in place. Resolves to whichever font is the default afterwards.
   */
  async setDefault(fontPath: string, options: FontLoadOptions = {}): Promise<FontObject | null> {
    const next = await loadFont(fontPath, { ...options, shared: true }, this.deps);

    if (!isFontReady(next)) {
      logWarning(`[${fontPath}] Default font not replaced`);
      this.teardownShared(next);
      return this.defaultFont;
    }

    const previous = this.defaultFont;
    this.defaultFont = next;
    if (previous) this.teardownShared(previous);
    return next;
  }

  getDefault(): FontObject | null {
    return this.defaultFont;
  }

  /** Unload every cached font loaded from `fontPath`. Resolves to how many were released. */
  async release(fontPath: string): Promise<number> {
    const entries: RegistryEntry[] = [];

    for (const [key, entry] of this.fonts) {
      if (entry.fontPath !== fontPath) continue;
      this.fonts.delete(key);
      entries.push(entry);
    }

    await this.unloadEntries(entries);
    return entries.length;
  }

  async releaseAll(): Promise<number> {
    const entries = Array.from(this.fonts.values());
    this.fonts.clear();
    await this.unloadEntries(entries);
    return entries.length;
  }

  get size(): number {
    return this.fonts.size;
  }

  // Entries leave the map first, so a load still in flight is unloaded once it lands
  private async unloadEntries(entries: RegistryEntry[]): Promise<void> {
    const fonts = await Promise.all(entries.map((entry) => entry.font));
    for (const font of fonts) {
      unloadFont(font, this.deps.textures);
    }
  }

  private teardownShared(font: FontObject): void {
    // Only the registry may retire a shared font, by taking ownership first
    font.ownsResources = true;
    unloadFont(font, this.deps.textures);
  }
}
