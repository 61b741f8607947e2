/**
 * Error reporting shared by the commands.
 */

import { ConfigError } from 'patternbook-core';
import { createCLIContext, type CLIContext, type CommandIO, type CommonOptions } from '../services/cli-context.js';

/**
 * JSON mode writes `{ "error": message }` to stdout; text mode writes a
 * red error line and an optional gray hint to stderr.
 */
export function reportError(ctx: CLIContext, error: Error, hint?: string): void {
  if (ctx.config.output === 'json') {
    ctx.io.out(JSON.stringify({ error: error.message }));
    return;
  }

  ctx.io.err(ctx.paint.red(`Error: ${error.message}`));
  if (hint) {
    ctx.io.err(ctx.paint.gray(hint));
  }
}

/**
 * Build the command context, or report a configuration error and return
 * null. Colors are not known yet at that point, so the line is plain.
 */
export function openCLIContext(
  options: CommonOptions,
  io: CommandIO,
  env: NodeJS.ProcessEnv
): CLIContext | null {
  try {
    return createCLIContext(options, io, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }
}
