/**
 * Run Command
 *
 * Print the demonstration trace of one pattern.
 *
 * Usage:
 *   patternbook run observer                         # Sample input
 *   patternbook run chain_of_responsibility admin    # Plain string input
 *   patternbook run observer '["a", "b"]'            # JSON input
 *   patternbook run state '["next"]' --json          # Output as JSON
 */

import { Command } from 'commander';
import {
  runWithRawInput,
  getPattern,
  UnknownPatternError,
  InvalidPatternInputError,
} from 'patternbook-core';
import { consoleIO, type CommandIO, type CommonOptions } from '../services/cli-context.js';
import { openCLIContext, reportError } from './report.js';

// =============================================================================
// Execution
// =============================================================================

/**
 * Run a pattern and write its trace; returns the process exit code.
 */
export function executeRun(
  patternId: string,
  rawInput: string | undefined,
  options: CommonOptions,
  io: CommandIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): number {
  const ctx = openCLIContext(options, io, env);
  if (!ctx) {
    return 1;
  }

  const jsonOutput = ctx.config.output === 'json';

  try {
    const lines = runWithRawInput(patternId, rawInput, { context: ctx.runContext });

    if (jsonOutput) {
      io.out(JSON.stringify({ pattern: patternId, lines }, null, 2));
    } else {
      for (const line of lines) {
        io.out(line);
      }
    }
    return 0;
  } catch (error) {
    if (error instanceof UnknownPatternError) {
      reportError(ctx, error, `Known patterns: ${error.knownPatterns.join(', ')}`);
      return 1;
    }
    if (error instanceof InvalidPatternInputError) {
      reportError(ctx, error, `Expected input: ${getPattern(error.patternId).inputHint}`);
      return 1;
    }
    throw error;
  }
}

// =============================================================================
// Command Definition
// =============================================================================

export function createRunCommand(): Command {
  return new Command('run')
    .description('Print the demonstration trace of a pattern')
    .argument('<pattern-id>', 'Pattern identifier (see `patternbook list`)')
    .argument('[input]', 'Input as plain text or JSON (defaults to the sample input)')
    .option('-j, --json', 'Output as JSON')
    .option('-v, --verbose', 'Log debug details to stderr')
    .option('--no-color', 'Disable colored output')
    .action((patternId: string, input: string | undefined, options: CommonOptions) => {
      const code = executeRun(patternId, input, options);
      if (code !== 0) {
        process.exit(code);
      }
    });
}
