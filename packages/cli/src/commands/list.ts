/**
 * List Command
 *
 * Show the catalog grouped by category.
 *
 * Usage:
 *   patternbook list                        # Every pattern
 *   patternbook list --category creational  # One category
 *   patternbook list --search factory       # Search id, name and summary
 *   patternbook list --json                 # Output as JSON
 */

import { Command } from 'commander';
import { listPatterns, PATTERN_CATEGORIES, type PatternCategory, type PatternSummary } from 'patternbook-core';
import { consoleIO, type CLIContext, type CommandIO, type CommonOptions } from '../services/cli-context.js';
import { openCLIContext, reportError } from './report.js';

export interface ListOptions extends CommonOptions {
  category?: string;
  search?: string;
}

const ID_COLUMN_WIDTH = 24;

function isCategory(value: string): value is PatternCategory {
  return PATTERN_CATEGORIES.some((category) => category === value);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// =============================================================================
// Execution
// =============================================================================

export function executeList(
  options: ListOptions,
  io: CommandIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): number {
  const ctx = openCLIContext(options, io, env);
  if (!ctx) {
    return 1;
  }

  const { category, search } = options;
  if (category !== undefined && !isCategory(category)) {
    reportError(
      ctx,
      new Error(`Unknown category: ${category}`),
      `Categories: ${PATTERN_CATEGORIES.join(', ')}`
    );
    return 1;
  }

  const result = listPatterns({
    filter: {
      categories: category !== undefined ? [category] : undefined,
      search,
    },
  });

  if (ctx.config.output === 'json') {
    io.out(JSON.stringify(result, null, 2));
  } else {
    printPatterns(ctx, result.patterns);
  }
  return 0;
}

// =============================================================================
// Output Formatting
// =============================================================================

function printPatterns(ctx: CLIContext, patterns: PatternSummary[]): void {
  const { io, paint } = ctx;

  if (patterns.length === 0) {
    io.out(paint.yellow('No patterns match.'));
    return;
  }

  for (const category of PATTERN_CATEGORIES) {
    const inCategory = patterns.filter((pattern) => pattern.category === category);
    if (inCategory.length === 0) continue;

    io.out(paint.bold(`${capitalize(category)} (${inCategory.length})`));
    for (const pattern of inCategory) {
      io.out(`  ${paint.cyan(pattern.id.padEnd(ID_COLUMN_WIDTH))} ${paint.gray(pattern.summary)}`);
    }
    io.out('');
  }
}

// =============================================================================
// Command Definition
// =============================================================================

export function createListCommand(): Command {
  return new Command('list')
    .description('List the available patterns')
    .option('-c, --category <category>', `Filter by category (${PATTERN_CATEGORIES.join(', ')})`)
    .option('-s, --search <text>', 'Search pattern id, name and summary')
    .option('-j, --json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .action((options: ListOptions) => {
      const code = executeList(options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
