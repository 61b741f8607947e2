/**
 * Patternbook MCP Server Implementation
 *
 * Exposes the pattern catalog to MCP clients as tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { createRunContext, logger, type PatternbookConfig, type RunContext } from 'patternbook-core';
import { CATALOG_TOOLS, handleToolCall } from './tools/index.js';

export const SERVER_NAME = 'patternbook';
export const SERVER_VERSION = '0.1.0';

export interface PatternbookMCPConfig {
  config?: PatternbookConfig;

  /**
   * Context shared by every tool call of this server, so the singleton
   * demonstration sees one configuration per server.
   */
  context?: RunContext;
}

export function createPatternbookMCPServer(options: PatternbookMCPConfig = {}): Server {
  const context =
    options.context ??
    createRunContext({
      config: options.config,
      logger: logger.child({ surface: 'mcp' }),
    });

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: CATALOG_TOOLS,
  }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, context);
  });

  return server;
}
