import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FontRegistry } from '../services/font-registry';
import type { MemoryTextureStore } from '../services/texture-store';
import type { FontRasterizer } from '../types/glyph';
import { registerGenerateAtlasTool } from './generate-atlas';
import { registerLayoutTextTool } from './layout-text';
import { registerListFontsTool } from './list-fonts';
import { registerMeasureTextTool } from './measure-text';
import { registerUnloadFontTool } from './unload-font';

export interface ToolContext<THandle> {
  rasterizer: FontRasterizer<THandle>;
  textures: MemoryTextureStore;
  registry: FontRegistry<THandle>;
}

export function registerAllTools<THandle>(server: McpServer, context: ToolContext<THandle>): void {
  registerGenerateAtlasTool(server, context);
  registerMeasureTextTool(server, context);
  registerLayoutTextTool(server, context);
  registerUnloadFontTool(server, context);
  registerListFontsTool(server, context);
}
