export type PixelFormat = 'grayscale' | 'gray-alpha';

export interface Bitmap {
  width: number;
  height: number;
  format: PixelFormat;
  mipmaps: number;
  data: Uint8Array;
}

export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Vector2 {
  x: number;
  y: number;
}
