/**
 * CLI Context Factory
 *
 * Merges environment configuration with command-line flags and builds the
 * RunContext, output writer and chalk instance a command works with.
 *
 * @module services/cli-context
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
  createRunContext,
  loadConfig,
  logger,
  setLogLevel,
  type PatternbookConfig,
  type RunContext,
} from 'patternbook-core';

/**
 * Flags shared by every command. Each one can only override the
 * environment in one direction.
 */
export interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
  /** false when --no-color was passed */
  color?: boolean;
}

/**
 * Where a command writes; tests capture lines instead of printing them.
 */
export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CLIContext {
  config: PatternbookConfig;
  runContext: RunContext;
  paint: ChalkInstance;
  io: CommandIO;
}

const plain = new Chalk({ level: 0 });

/**
 * Create the context for one CLI command invocation.
 *
 * @throws ConfigError when the environment holds unsupported values
 */
export function createCLIContext(
  options: CommonOptions,
  io: CommandIO = consoleIO,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  const fromEnv = loadConfig(env);
  const config: PatternbookConfig = {
    logLevel: options.verbose ? 'debug' : fromEnv.logLevel,
    output: options.json ? 'json' : fromEnv.output,
    color: fromEnv.color && options.color !== false,
  };

  setLogLevel(config.logLevel);

  return {
    config,
    runContext: createRunContext({ config, logger: logger.child({ surface: 'cli' }) }),
    paint: config.color ? chalk : plain,
    io,
  };
}
