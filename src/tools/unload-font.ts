import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ToolContext } from './index';

const unloadFontSchema = z.object({
  fontPath: z.string().optional().describe('Font file whose cached atlases should be released'),
  all: z.boolean().optional().describe('Release every cached font (default: false)'),
});

export function registerUnloadFontTool<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  server.tool('unload-font', 'Release fonts cached by measure-text and layout-text', unloadFontSchema.shape, async ({ fontPath, all = false }) => {
    try {
      if (!all && !fontPath) {
        return {
          content: [
            {
              type: 'text',
              text: '❌ Pass fontPath or all: true',
            },
          ],
        };
      }

      const released = all ? await context.registry.releaseAll() : await context.registry.release(fontPath ?? '');

      return {
        content: [
          {
            type: 'text',
            text: `🧹 Released ${released} font(s), ${context.registry.size} still cached`,
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
  });
}
