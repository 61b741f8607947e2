/**
 * patternbook-mcp
 *
 * @module patternbook-mcp
 */

export { createPatternbookMCPServer, SERVER_NAME, SERVER_VERSION, type PatternbookMCPConfig } from './server.js';
export { CATALOG_TOOLS, handleToolCall, type ToolResponse } from './tools/index.js';
