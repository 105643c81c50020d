import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { DEFAULT_FONT_SIZE } from '../config/defaults';
import { measureText } from '../services/text-layout';
import { resolveCodepoints } from '../utils/unicode-utils';
import type { ToolContext } from './index';
import { resolveFont } from './resolve-font';

const measureTextSchema = z.object({
  fontPath: z.string().optional().describe('Path to a .ttf or .otf file (default: the server default font)'),
  text: z.string().describe('Text to measure; "\\n" starts a new line'),
  fontSize: z.number().positive().optional().describe('Size to measure at (default: base size)'),
  baseSize: z.number().int().positive().optional().describe('Pixel size the glyphs are generated at (default: 32)'),
  spacing: z.number().optional().describe('Extra pixels between glyphs (default: 0)'),
  characters: z.string().optional().describe('Glyph set to load (default: ASCII 32..126)'),
  mode: z.enum(['default', 'bitmap', 'sdf']).optional().describe('Glyph generation mode (default: "default")'),
});

export function registerMeasureTextTool<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  server.tool(
    'measure-text',
    'Measure the pixel size of a text drawn with a font',
    measureTextSchema.shape,
    async ({ fontPath, text, fontSize, baseSize = DEFAULT_FONT_SIZE, spacing = 0, characters, mode = 'default' }) => {
      try {
        const resolved = await resolveFont(context, fontPath, { fontSize: baseSize, codepoints: resolveCodepoints(characters), mode });

        if (!resolved.font) {
          return {
            content: [
              {
                type: 'text',
                text: resolved.error,
              },
            ],
          };
        }

        const font = resolved.font;
        const size = measureText(font, text, fontSize ?? baseSize, spacing);

        return {
          content: [
            {
              type: 'text',
              text: `📏 ${JSON.stringify(text)} at ${fontSize ?? baseSize}px: ${size.x} x ${size.y}`,
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Error: ${error}`,
            },
          ],
        };
      }
    },
  );
}
