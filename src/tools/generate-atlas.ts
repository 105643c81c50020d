import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { DEFAULT_ATLAS_PADDING, DEFAULT_FONT_SIZE } from '../config/defaults';
import { encodeAtlasPng, writeOutputFile } from '../services/file-handler';
import { isFontReady, loadFont, unloadFont } from '../services/font-loader';
import { generateAtlasDescriptor, generateBMFont } from '../services/template-generator';
import type { AtlasExportConfig } from '../types/font';
import { resolveCodepoints } from '../utils/unicode-utils';
import type { ToolContext } from './index';
import fs from 'fs-extra';
import * as path from 'path';

const generateAtlasSchema = z.object({
  fontPath: z.string().describe('Path to a .ttf or .otf file'),
  fontSize: z.number().int().positive().optional().describe('Glyph pixel height (default: 32)'),
  characters: z.string().optional().describe('Characters to include (default: ASCII 32..126)'),
  codepointRanges: z.string().optional().describe('Codepoint ranges to include, e.g. "32-126,0x410-0x44F"'),
  mode: z.enum(['default', 'bitmap', 'sdf']).optional().describe('Antialiased, two-level bitmap or signed distance field (default: "default")'),
  padding: z.number().int().min(0).optional().describe('Pixels kept free around each glyph (default: 2)'),
  packing: z.enum(['row', 'skyline']).optional().describe('Packing algorithm (default: "row")'),
  fontName: z.string().optional().describe('Base name of the generated files (default: font file name)'),
  outputDir: z.string().optional().describe('Output directory (default: "./atlases")'),
  formats: z.array(z.enum(['png', 'json', 'fnt'])).optional().describe('Files to generate (default: png, json, fnt)'),
});

export function registerGenerateAtlasTool<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  server.tool(
    'generate-font-atlas',
    'Rasterize a font into a packed glyph atlas and write the image and its glyph table',
    generateAtlasSchema.shape,
    async ({
      fontPath,
      fontSize = DEFAULT_FONT_SIZE,
      characters,
      codepointRanges,
      mode = 'default',
      padding = DEFAULT_ATLAS_PADDING,
      packing = 'row',
      fontName,
      outputDir = './atlases',
      formats = ['png', 'json', 'fnt'],
    }) => {
      try {
        if (!(await fs.pathExists(fontPath))) {
          return {
            content: [
              {
                type: 'text',
                text: `❌ Font file ${fontPath} does not exist`,
              },
            ],
          };
        }

        const codepoints = resolveCodepoints(characters, codepointRanges);
        const font = await loadFont(fontPath, { fontSize, codepoints, mode, padding, packing }, context);

        if (!isFontReady(font) || !font.texture) {
          return {
            content: [
              {
                type: 'text',
                text: `❌ ${fontPath} could not be loaded as a font`,
              },
            ],
          };
        }

        const config: AtlasExportConfig = {
          fontName: fontName ?? path.basename(fontPath, path.extname(fontPath)),
          formats,
          outputDir,
        };
        const texture = font.texture;
        const glyphCount = font.glyphCount;
        const unpacked = font.unpacked.length;
        const baseName = `${config.fontName}-${fontSize}`;
        const imageFile = `${baseName}.png`;
        const savedFiles: string[] = [];

        try {
          if (config.formats.includes('png')) {
            const atlas = context.textures.get(texture);
            if (atlas) {
              savedFiles.push(await writeOutputFile(config.outputDir, imageFile, encodeAtlasPng(atlas)));
            }
          }

          const descriptorOptions = { fontName: config.fontName, imageFile, padding };

          if (config.formats.includes('json')) {
            const descriptor = generateAtlasDescriptor(font, descriptorOptions);
            savedFiles.push(await writeOutputFile(config.outputDir, `${baseName}.json`, JSON.stringify(descriptor, null, 2)));
          }

          if (config.formats.includes('fnt')) {
            savedFiles.push(await writeOutputFile(config.outputDir, `${baseName}.fnt`, generateBMFont(font, descriptorOptions)));
          }
        } finally {
          unloadFont(font, context.textures);
        }

        const report = `✅ Font atlas generated successfully!

📊 Statistics:
• Glyphs: ${glyphCount}
• Atlas size: ${texture.width}x${texture.height}
• Mode: ${mode}, packing: ${packing}, padding: ${padding}
${unpacked > 0 ? `• ⚠️ Glyphs that did not fit: ${unpacked}\n` : ''}
📁 Generated files:
${savedFiles.map((file) => `   • ${file}`).join('\n')}`;

        return {
          content: [
            {
              type: 'text',
              text: report,
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
