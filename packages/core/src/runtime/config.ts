/**
 * Configuration
 *
 * Reads patternbook settings from environment variables.
 *
 * Environment Variables:
 *   PATTERNBOOK_LOG_LEVEL - debug | info | warn | error (default: warn)
 *   PATTERNBOOK_OUTPUT    - text | json (default: text)
 *   PATTERNBOOK_COLOR     - true | false (default: true)
 *
 * @module runtime/config
 */

import { z } from 'zod';
import { formatIssues } from '../catalog/define.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface PatternbookConfig {
  logLevel: LogLevel;
  output: OutputFormat;
  color: boolean;
}

export const DEFAULT_CONFIG: PatternbookConfig = {
  logLevel: 'warn',
  output: 'text',
  color: true,
};

const EnvSchema = z.object({
  PATTERNBOOK_LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
  PATTERNBOOK_OUTPUT: z.enum(OUTPUT_FORMATS).default(DEFAULT_CONFIG.output),
  PATTERNBOOK_COLOR: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

/**
 * Error thrown when an environment variable holds an unsupported value
 */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the configuration from an environment map.
 *
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PatternbookConfig {
  const relevant = {
    PATTERNBOOK_LOG_LEVEL: env['PATTERNBOOK_LOG_LEVEL'] || undefined,
    PATTERNBOOK_OUTPUT: env['PATTERNBOOK_OUTPUT'] || undefined,
    PATTERNBOOK_COLOR: env['PATTERNBOOK_COLOR'] || undefined,
  };

  const parsed = EnvSchema.safeParse(relevant);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  return {
    logLevel: parsed.data.PATTERNBOOK_LOG_LEVEL,
    output: parsed.data.PATTERNBOOK_OUTPUT,
    color: parsed.data.PATTERNBOOK_COLOR,
  };
}
