import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { findFontFiles, readFontFile } from '../services/file-handler';
import type { FontInfo } from '../types/glyph';
import { logDebug } from '../utils/log';
import type { ToolContext } from './index';
import fs from 'fs-extra';
import * as path from 'path';

const listFontsSchema = z.object({
  directory: z.string().describe('Directory to explore'),
});

interface FontFileReport {
  file: string;
  info: FontInfo | null;
}

// Same rasterizer as atlas generation
async function inspectFontFile<THandle>(context: ToolContext<THandle>, file: string): Promise<FontFileReport> {
  try {
    const handle = context.rasterizer.initialize(await readFontFile(file));
    return { file, info: handle === null ? null : context.rasterizer.fontInfo(handle) };
  } catch (error) {
    logDebug(`${file}: ${error}`);
    return { file, info: null };
  }
}

function formatReport(directory: string, { file, info }: FontFileReport): string {
  const relativePath = path.relative(directory, file);
  return info ? `• ${info.familyName} (${relativePath}), ${info.glyphCount} glyphs` : `• ⚠️ ${relativePath} could not be parsed`;
}

export function registerListFontsTool<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  server.tool('list-fonts', 'List the TrueType/OpenType fonts in a directory with their family and glyph count', listFontsSchema.shape, async ({ directory }) => {
    try {
      if (!(await fs.pathExists(directory))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Directory ${directory} does not exist`,
            },
          ],
        };
      }

      const reports: FontFileReport[] = [];
      for (const file of await findFontFiles(directory)) {
        reports.push(await inspectFontFile(context, file));
      }

      if (reports.length === 0) {
        return {
          content: [
            {
              type: 'text',
              text: `No font files found in ${directory}`,
            },
          ],
        };
      }

      const unreadable = reports.filter((report) => !report.info).length;
      const summary = `Total: ${reports.length} files${unreadable > 0 ? `, ${unreadable} unreadable` : ''}`;

      return {
        content: [
          {
            type: 'text',
            text: `📁 Fonts found in ${directory}:\n\n${reports.map((report) => formatReport(directory, report)).join('\n')}\n\n${summary}`,
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
