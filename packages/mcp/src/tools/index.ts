/**
 * MCP Tools
 *
 * Catalog tools plus the dispatcher used by the server's CallTool handler.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { formatIssues, type RunContext } from 'patternbook-core';
import type { ZodType, ZodTypeDef } from 'zod';

import {
  listToolDefinition,
  describeToolDefinition,
  runToolDefinition,
  ListArgs,
  DescribeArgs,
  RunArgs,
  handleList,
  handleDescribe,
  handleRun,
} from './catalog.js';
import { errorResponse, type ToolResponse } from './response.js';

export * from './catalog.js';
export * from './response.js';

/**
 * All catalog tools
 */
export const CATALOG_TOOLS: Tool[] = [listToolDefinition, describeToolDefinition, runToolDefinition];

function withArgs<T>(
  tool: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  args: unknown,
  handler: (parsed: T) => ToolResponse
): ToolResponse {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    return errorResponse(`Error: Invalid arguments for ${tool}: ${formatIssues(parsed.error).join('; ')}`);
  }
  return handler(parsed.data);
}

/**
 * Dispatch a tool call. Failures come back as isError responses.
 */
export function handleToolCall(name: string, args: unknown, context: RunContext): ToolResponse {
  context.logger.debug('Tool call', { tool: name });

  try {
    switch (name) {
      case 'patterns_list':
        return withArgs(name, ListArgs, args, handleList);

      case 'patterns_describe':
        return withArgs(name, DescribeArgs, args, handleDescribe);

      case 'patterns_run':
        return withArgs(name, RunArgs, args, (parsed) => handleRun(parsed, context));

      default:
        return errorResponse(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return errorResponse(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}
