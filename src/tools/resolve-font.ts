import fs from 'fs-extra';
import { isFontReady } from '../services/font-loader';
import type { FontLoadOptions, FontObject } from '../types/font';
import type { ToolContext } from './index';

export type ResolvedFont = { font: FontObject; error?: undefined } | { font?: undefined; error: string };

/** The cached font for `fontPath`, or the server's default font when no path is given. */
export async function resolveFont<THandle>(context: ToolContext<THandle>, fontPath: string | undefined, options: FontLoadOptions): Promise<ResolvedFont> {
  if (!fontPath) {
    const font = context.registry.getDefault();
    return font && isFontReady(font) ? { font } : { error: '❌ No fontPath given and no default font configured' };
  }

  if (!(await fs.pathExists(fontPath))) {
    return { error: `❌ Font file ${fontPath} does not exist` };
  }

  const font = await context.registry.acquire(fontPath, options);
  return isFontReady(font) ? { font } : { error: `❌ ${fontPath} could not be loaded as a font` };
}
