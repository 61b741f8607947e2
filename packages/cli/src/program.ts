/**
 * patternbook command-line program
 *
 * @module program
 */

import { Command } from 'commander';
import { createDescribeCommand, createListCommand, createRunCommand } from './commands/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  return new Command('patternbook')
    .description('Run textbook design pattern demonstrations')
    .version(VERSION)
    .addCommand(createRunCommand())
    .addCommand(createListCommand())
    .addCommand(createDescribeCommand());
}
