/**
 * Logger
 *
 * Structured, level-based logging with persistent context fields.
 * Entries go to stderr so that stdout carries nothing but demonstration
 * output. Hosts can replace the sink with setLogHandler().
 *
 * @module runtime/logger
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** One JSON object per line on stderr. */
const stderrHandler: LogHandler = (entry) => {
  process.stderr.write(
    `${JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context })}\n`
  );
};

let currentHandler: LogHandler = stderrHandler;
let currentMinLevel: LogLevel = 'warn';

/** Replace the log sink (tests, embedding hosts). Pass nothing to restore stderr. */
export function setLogHandler(handler: LogHandler = stderrHandler): void {
  currentHandler = handler;
}

/** Messages below this level are dropped. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentMinLevel;
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log('debug', msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log('info', msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log('warn', msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log('error', msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Root logger. */
export const logger = createLogger({ component: 'patternbook' });
