import type { Bitmap, PixelFormat, Rectangle } from '../types/bitmap';

export function bytesPerPixel(format: PixelFormat): number {
  return format === 'gray-alpha' ? 2 : 1;
}

export function createBitmap(width: number, height: number, format: PixelFormat = 'grayscale', data?: Uint8Array): Bitmap {
  const size = width * height * bytesPerPixel(format);

  if (data && data.length < size) {
    throw new Error(`Bitmap data too short: expected ${size} bytes, got ${data.length}`);
  }

  return {
    width,
    height,
    format,
    mipmaps: 1,
    data: data ?? new Uint8Array(size),
  };
}

export function emptyBitmap(format: PixelFormat = 'grayscale'): Bitmap {
  return createBitmap(0, 0, format);
}

/** Copy a grayscale bitmap into a grayscale destination, row by row. */
export function copyBitmapInto(src: Bitmap, dst: Bitmap, dstX: number, dstY: number): void {
  if (src.format !== 'grayscale' || dst.format !== 'grayscale') {
    throw new Error('copyBitmapInto expects grayscale bitmaps');
  }
  if (dstX < 0 || dstY < 0 || dstX + src.width > dst.width || dstY + src.height > dst.height) {
    throw new Error(`Bitmap ${src.width}x${src.height} does not fit at ${dstX},${dstY} in ${dst.width}x${dst.height}`);
  }

  for (let y = 0; y < src.height; y++) {
    const srcRow = y * src.width;
    dst.data.set(src.data.subarray(srcRow, srcRow + src.width), (dstY + y) * dst.width + dstX);
  }
}

export function cropBitmap(src: Bitmap, rect: Rectangle): Bitmap {
  const bpp = bytesPerPixel(src.format);
  const x = Math.max(0, Math.floor(rect.x));
  const y = Math.max(0, Math.floor(rect.y));
  const width = Math.max(0, Math.min(Math.floor(rect.width), src.width - x));
  const height = Math.max(0, Math.min(Math.floor(rect.height), src.height - y));
  const cropped = createBitmap(width, height, src.format);
  const rowBytes = width * bpp;

  for (let row = 0; row < height; row++) {
    const srcStart = ((y + row) * src.width + x) * bpp;
    cropped.data.set(src.data.subarray(srcStart, srcStart + rowBytes), row * rowBytes);
  }

  return cropped;
}

/** Two-level mask: below `threshold` becomes 0, the rest 255. */
export function binarize(data: Uint8Array, threshold: number): void {
  for (let i = 0; i < data.length; i++) {
    data[i] = data[i] < threshold ? 0 : 255;
  }
}

/** Every pixel becomes (255, intensity), a white glyph masked by its own coverage. */
export function grayscaleToGrayAlpha(src: Bitmap): Bitmap {
  if (src.format !== 'grayscale') {
    throw new Error(`Expected grayscale bitmap, got ${src.format}`);
  }

  const pixelCount = src.width * src.height;
  const data = new Uint8Array(pixelCount * 2);

  for (let i = 0, k = 0; i < pixelCount; i++, k += 2) {
    data[k] = 255;
    data[k + 1] = src.data[i];
  }

  return createBitmap(src.width, src.height, 'gray-alpha', data);
}

export function releaseBitmap(bitmap: Bitmap): void {
  bitmap.data = new Uint8Array(0);
  bitmap.width = 0;
  bitmap.height = 0;
}
