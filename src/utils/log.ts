// stdout belongs to the MCP transport, so everything here goes to stderr
const PREFIX = '[glyph-atlas]';

export function logError(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function logWarning(message: string): void {
  console.warn(`${PREFIX} ${message}`);
}

export function logDebug(message: string): void {
  if (process.env.GLYPH_ATLAS_DEBUG) {
    console.error(`${PREFIX} ${message}`);
  }
}
