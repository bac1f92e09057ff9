/**
 * Structured logging.
 *
 * Every entry names the module that wrote it (ingest, matcher, registry,
 * conflicts, api) so reconciliation decisions for one unit can be followed
 * across services. Embedders route entries with setLogHandler(); tests
 * capture them the same way.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/** Modules that own a child logger. */
export type LogModule = 'ingest' | 'matcher' | 'registry' | 'conflicts' | 'api';

export interface LogEntry {
  level: LogLevel;
  message: string;
  component: string;
  module?: LogModule;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const COMPONENT = 'geo-reconcile';

/** One JSON line per entry; warnings and errors go to stderr. */
const defaultLogHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    ts: entry.timestamp,
    level: entry.level,
    component: entry.component,
    module: entry.module,
    msg: entry.message,
    ...entry.context,
  });
  if (entry.level === LogLevel.Error || entry.level === LogLevel.Warn) {
    console.error(line);
  } else {
    console.log(line);
  }
};

let currentHandler: LogHandler = defaultLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Restore the console handler and the `info` threshold. */
export function resetLogging(): void {
  currentHandler = defaultLogHandler;
  currentMinLevel = LogLevel.Info;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger for one module; `context` fields are added to every entry. */
  child(module: LogModule, context?: Record<string, unknown>): Logger;
}

export function createLogger(module?: LogModule, baseContext: Record<string, unknown> = {}): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
    const merged = { ...baseContext, ...context };
    currentHandler({
      level,
      message,
      component: COMPONENT,
      module,
      context: Object.keys(merged).length > 0 ? merged : undefined,
      timestamp: new Date().toISOString(),
    });
  };
  return {
    debug: (msg, ctx) => write(LogLevel.Debug, msg, ctx),
    info: (msg, ctx) => write(LogLevel.Info, msg, ctx),
    warn: (msg, ctx) => write(LogLevel.Warn, msg, ctx),
    error: (msg, ctx) => write(LogLevel.Error, msg, ctx),
    child: (childModule, ctx) => createLogger(childModule, { ...baseContext, ...ctx }),
  };
}

export const logger = createLogger();
