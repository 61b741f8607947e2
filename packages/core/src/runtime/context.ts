/**
 * Run Context
 *
 * Everything a demonstration may depend on is carried here and passed in
 * explicitly. There is no process-wide instance: the context is created
 * by whoever starts a run and lives as long as they hold on to it.
 *
 * @module runtime/context
 */

import { DEFAULT_CONFIG, type PatternbookConfig } from './config.js';
import { logger as rootLogger, type Logger } from './logger.js';

/**
 * Settings object handed out by the singleton demonstration
 */
export interface DemoConfiguration {
  readonly instanceId: number;
  readonly createdAt: string;
}

/**
 * Lazily creates one DemoConfiguration and returns it on every access.
 */
export class ConfigurationHolder {
  private instance: DemoConfiguration | null = null;
  private creations = 0;

  /** Whether the configuration has been created yet. */
  get created(): boolean {
    return this.instance !== null;
  }

  access(): DemoConfiguration {
    if (this.instance === null) {
      this.creations += 1;
      this.instance = {
        instanceId: this.creations,
        createdAt: new Date().toISOString(),
      };
    }
    return this.instance;
  }
}

export interface RunContext {
  config: PatternbookConfig;
  logger: Logger;
  configuration: ConfigurationHolder;
}

export function createRunContext(overrides: Partial<RunContext> = {}): RunContext {
  return {
    config: overrides.config ?? { ...DEFAULT_CONFIG },
    logger: overrides.logger ?? rootLogger,
    configuration: overrides.configuration ?? new ConfigurationHolder(),
  };
}
