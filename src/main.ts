import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { FontRegistry } from './services/font-registry';
import { OpentypeRasterizer } from './services/opentype-rasterizer';
import { MemoryTextureStore } from './services/texture-store';
import { registerAllTools } from './tools';
import { logError } from './utils/log';

async function main() {
  const server = new McpServer({
    name: 'glyph-atlas',
    version: '1.0.0',
    description: 'MCP server for packing font glyph atlases and laying out text with them',
  });

  const rasterizer = new OpentypeRasterizer();
  const textures = new MemoryTextureStore();
  const registry = new FontRegistry(rasterizer, textures);

  const defaultFontPath = process.env.GLYPH_ATLAS_DEFAULT_FONT;
  if (defaultFontPath) {
    await registry.setDefault(defaultFontPath);
  }

  registerAllTools(server, { rasterizer, textures, registry });

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().catch((error) => {
  logError(`Server failed to start: ${error}`);
  process.exit(1);
});
