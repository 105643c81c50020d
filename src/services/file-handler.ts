import { glob } from 'glob';
import fs from 'fs-extra';
import * as path from 'path';
import pngjs from 'pngjs';
import type { Bitmap } from '../types/bitmap';

const { PNG } = pngjs;

export async function findFontFiles(directory: string): Promise<string[]> {
  try {
    const fontPattern = path.join(directory, '**/*.{ttf,otf}').split(path.sep).join('/');
    const files = await glob(fontPattern, { nocase: true });
    return files.sort();
  } catch (error) {
    throw new Error(`Error finding font files: ${error}`);
  }
}

/** Whole-file read of a font; the rasterizer gets these bytes untouched. */
export async function readFontFile(fontPath: string): Promise<Uint8Array> {
  try {
    const buffer = await fs.readFile(fontPath);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw new Error(`Error reading font file: ${error}`);
  }
}

/** PNG of a gray-alpha atlas, expanded to RGBA the way a texture sampler would see it. */
export function encodeAtlasPng(atlas: Bitmap): Buffer {
  if (atlas.format !== 'gray-alpha') {
    throw new Error(`Expected gray-alpha atlas, got ${atlas.format}`);
  }

  const png = new PNG({ width: atlas.width, height: atlas.height });
  const pixelCount = atlas.width * atlas.height;

  for (let i = 0; i < pixelCount; i++) {
    const gray = atlas.data[i * 2];
    png.data[i * 4] = gray;
    png.data[i * 4 + 1] = gray;
    png.data[i * 4 + 2] = gray;
    png.data[i * 4 + 3] = atlas.data[i * 2 + 1];
  }

  return PNG.sync.write(png);
}

export async function writeOutputFile(outputDir: string, fileName: string, contents: string | Buffer): Promise<string> {
  try {
    await fs.ensureDir(outputDir);
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, contents);
    return filePath;
  } catch (error) {
    throw new Error(`Error writing ${fileName}: ${error}`);
  }
}
