/**
 * patternbook-cli
 *
 * @module patternbook-cli
 */

export { createProgram, VERSION } from './program.js';
export * from './commands/index.js';
export {
  createCLIContext,
  consoleIO,
  type CLIContext,
  type CommandIO,
  type CommonOptions,
} from './services/cli-context.js';
