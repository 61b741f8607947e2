#!/usr/bin/env node
/**
 * Patternbook MCP stdio entry point
 *
 * stdout carries the protocol; logs go to stderr.
 *
 * Environment Variables:
 *   PATTERNBOOK_LOG_LEVEL - debug | info | warn | error (default: warn)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, logger, setLogLevel } from 'patternbook-core';
import { createPatternbookMCPServer } from '../server.js';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const server = createPatternbookMCPServer({ config });
  await server.connect(new StdioServerTransport());
  logger.info('MCP server listening on stdio');
}

main().catch((error: unknown) => {
  logger.error('MCP server failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
