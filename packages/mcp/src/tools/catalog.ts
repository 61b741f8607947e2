/**
 * Catalog Tools
 *
 * Tools:
 * - patterns_list: Catalog summaries, optionally filtered
 * - patterns_describe: One pattern's summary and input hint
 * - patterns_run: Demonstration trace for a pattern
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  getPattern,
  listPatterns,
  run,
  runWithRawInput,
  toPatternSummary,
  PATTERN_CATEGORIES,
  type RunContext,
} from 'patternbook-core';
import { jsonResponse, type ToolResponse } from './response.js';

// ============================================================================
// Definitions
// ============================================================================

export const listToolDefinition: Tool = {
  name: 'patterns_list',
  description: 'List the design pattern demonstrations in the catalog.',
  inputSchema: {
    type: 'object',
    properties: {
      category: {
        type: 'string',
        enum: [...PATTERN_CATEGORIES],
        description: 'Only patterns in this category',
      },
      search: {
        type: 'string',
        description: 'Case-insensitive search in id, name and summary',
      },
    },
    required: [],
  },
};

export const describeToolDefinition: Tool = {
  name: 'patterns_describe',
  description: 'Describe a pattern demonstration and the input it accepts.',
  inputSchema: {
    type: 'object',
    properties: {
      pattern: { type: 'string', description: 'Pattern identifier, e.g. "observer"' },
    },
    required: ['pattern'],
  },
};

export const runToolDefinition: Tool = {
  name: 'patterns_run',
  description:
    'Run a pattern demonstration and return the lines it prints. Omit input to use the sample input.',
  inputSchema: {
    type: 'object',
    properties: {
      pattern: { type: 'string', description: 'Pattern identifier, e.g. "observer"' },
      input: {
        description: 'Demonstration input: a JSON value, or a string read as plain text or JSON',
      },
    },
    required: ['pattern'],
  },
};

// ============================================================================
// Argument Schemas
// ============================================================================

export const ListArgs = z.object({
  category: z.enum(PATTERN_CATEGORIES).optional(),
  search: z.string().optional(),
});

export const DescribeArgs = z.object({
  pattern: z.string().min(1),
});

export const RunArgs = z.object({
  pattern: z.string().min(1),
  input: z.unknown().optional(),
});

// ============================================================================
// Handlers
// ============================================================================

export function handleList(args: z.infer<typeof ListArgs>): ToolResponse {
  const result = listPatterns({
    filter: {
      categories: args.category ? [args.category] : undefined,
      search: args.search,
    },
  });
  return jsonResponse(result);
}

export function handleDescribe(args: z.infer<typeof DescribeArgs>): ToolResponse {
  return jsonResponse(toPatternSummary(getPattern(args.pattern)));
}

export function handleRun(args: z.infer<typeof RunArgs>, context: RunContext): ToolResponse {
  const lines =
    typeof args.input === 'string'
      ? runWithRawInput(args.pattern, args.input, { context })
      : run(args.pattern, args.input, { context });

  return jsonResponse({ pattern: args.pattern, lines });
}
