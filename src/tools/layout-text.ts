import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { DEFAULT_FONT_SIZE } from '../config/defaults';
import { layoutText, measureText } from '../services/text-layout';
import { resolveCodepoints } from '../utils/unicode-utils';
import type { ToolContext } from './index';
import { resolveFont } from './resolve-font';

const layoutTextSchema = z.object({
  fontPath: z.string().optional().describe('Path to a .ttf or .otf file (default: the server default font)'),
  text: z.string().describe('Text to lay out; "\\n" starts a new line'),
  x: z.number().optional().describe('Left edge of the first line (default: 0)'),
  y: z.number().optional().describe('Top edge of the first line (default: 0)'),
  fontSize: z.number().positive().optional().describe('Size to draw at (default: base size)'),
  baseSize: z.number().int().positive().optional().describe('Pixel size the glyphs are generated at (default: 32)'),
  spacing: z.number().optional().describe('Extra pixels between glyphs (default: 0)'),
  characters: z.string().optional().describe('Glyph set to load (default: ASCII 32..126)'),
});

export function registerLayoutTextTool<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  server.tool(
    'layout-text',
    'Compute the atlas source and screen destination rectangle of every glyph drawn for a text',
    layoutTextSchema.shape,
    async ({ fontPath, text, x = 0, y = 0, fontSize, baseSize = DEFAULT_FONT_SIZE, spacing = 0, characters }) => {
      try {
        const resolved = await resolveFont(context, fontPath, { fontSize: baseSize, codepoints: resolveCodepoints(characters) });

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
        const size = fontSize ?? baseSize;
        const commands = layoutText(font, text, { x, y }, size, spacing);
        const bounds = measureText(font, text, size, spacing);

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify({ atlas: font.texture, bounds, commands }, null, 2),
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
