/**
 * Describe Command
 *
 * Show what a pattern demonstrates and the input it takes.
 *
 * Usage:
 *   patternbook describe memento
 *   patternbook describe memento --json
 */

import { Command } from 'commander';
import { getPattern, isPatternId, toPatternSummary, PATTERN_IDS, UnknownPatternError } from 'patternbook-core';
import { consoleIO, type CommandIO, type CommonOptions } from '../services/cli-context.js';
import { openCLIContext, reportError } from './report.js';

export function executeDescribe(
  patternId: string,
  options: CommonOptions,
  io: CommandIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): number {
  const ctx = openCLIContext(options, io, env);
  if (!ctx) {
    return 1;
  }

  if (!isPatternId(patternId)) {
    reportError(
      ctx,
      new UnknownPatternError(patternId, PATTERN_IDS),
      'Run `patternbook list` to see the available patterns.'
    );
    return 1;
  }

  const summary = toPatternSummary(getPattern(patternId));

  if (ctx.config.output === 'json') {
    io.out(JSON.stringify(summary, null, 2));
    return 0;
  }

  const { paint } = ctx;
  io.out(`${paint.bold(summary.name)} ${paint.gray(`(${summary.id})`)}`);
  io.out(`  Category:     ${summary.category}`);
  io.out(`  Summary:      ${summary.summary}`);
  io.out(`  Input:        ${summary.inputHint}`);
  io.out(`  Sample input: ${paint.cyan(JSON.stringify(summary.sampleInput))}`);
  return 0;
}

export function createDescribeCommand(): Command {
  return new Command('describe')
    .description('Show what a pattern demonstrates and the input it takes')
    .argument('<pattern-id>', 'Pattern identifier')
    .option('-j, --json', 'Output as JSON')
    .option('--no-color', 'Disable colored output')
    .action((patternId: string, options: CommonOptions) => {
      const code = executeDescribe(patternId, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
