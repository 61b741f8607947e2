/**
 * Runtime: logging, configuration and the explicit run context
 *
 * @module runtime
 */

export {
  logger,
  createLogger,
  setLogHandler,
  setLogLevel,
  getLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogHandler,
} from './logger.js';

export {
  loadConfig,
  ConfigError,
  DEFAULT_CONFIG,
  OUTPUT_FORMATS,
  type PatternbookConfig,
  type OutputFormat,
} from './config.js';

export {
  createRunContext,
  ConfigurationHolder,
  type RunContext,
  type DemoConfiguration,
} from './context.js';
