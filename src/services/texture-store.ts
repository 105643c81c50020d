import type { Bitmap } from '../types/bitmap';
import type { TextureFilter, TextureHandle, TextureUploader } from '../types/font';
import { createBitmap } from '../utils/bitmap-utils';

interface StoredTexture {
  bitmap: Bitmap;
  filter: TextureFilter;
}

/** Keeps uploaded atlases in process memory, standing in for a GPU. */
export class MemoryTextureStore implements TextureUploader {
  private nextId = 1;
  private readonly textures = new Map<number, StoredTexture>();

  upload(bitmap: Bitmap): TextureHandle {
    const id = this.nextId++;
    const copy = createBitmap(bitmap.width, bitmap.height, bitmap.format, bitmap.data.slice());
    this.textures.set(id, { bitmap: copy, filter: 'bilinear' });
    return { id, width: bitmap.width, height: bitmap.height };
  }

  setFilter(handle: TextureHandle, filter: TextureFilter): void {
    const texture = this.textures.get(handle.id);
    if (!texture) {
      throw new Error(`Unknown texture ${handle.id}`);
    }
    texture.filter = filter;
  }

  release(handle: TextureHandle): void {
    this.textures.delete(handle.id);
  }

  get(handle: TextureHandle): Bitmap | undefined {
    return this.textures.get(handle.id)?.bitmap;
  }

  filterOf(handle: TextureHandle): TextureFilter | undefined {
    return this.textures.get(handle.id)?.filter;
  }

  get size(): number {
    return this.textures.size;
  }
}
