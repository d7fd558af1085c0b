/**
 * Logger abstraction.
 *
 * Structured, level-based logging with persistent context fields. Entries
 * go through a single replaceable handler (JSON lines on the console by
 * default); hosts route them elsewhere with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** A logger whose entries also carry `context`. */
  child(context: Record<string, unknown>): Logger;
}

/** Levels from least to most severe. */
const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/** One JSON line: level, timestamp and message first, then the context fields. */
export function formatLogEntry(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
}

const consoleHandler: LogHandler = (entry) => {
  const line = formatLogEntry(entry);
  if (entry.level === LogLevel.Error) console.error(line);
  else if (entry.level === LogLevel.Warn) console.warn(line);
  else console.log(line);
};

const settings: { handler: LogHandler; minLevel: LogLevel } = {
  handler: consoleHandler,
  minLevel: LogLevel.Info,
};

/** Replace the log handler (e.g., for testing or external log systems). */
export function setLogHandler(handler: LogHandler): void {
  settings.handler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  settings.minLevel = level;
}

export function getLogLevel(): LogLevel {
  return settings.minLevel;
}

/** Restore the console handler and the info threshold. */
export function resetLogging(): void {
  settings.handler = consoleHandler;
  settings.minLevel = LogLevel.Info;
}

/** Parse a level name (case-insensitive). Returns undefined for unknown names. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

function write(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(settings.minLevel)) return;
  settings.handler({ level, message, context, timestamp: new Date().toISOString() });
}

/** Create a logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    write(level, message, { ...baseContext, ...context });

  return {
    debug: at(LogLevel.Debug),
    info: at(LogLevel.Info),
    warn: at(LogLevel.Warn),
    error: at(LogLevel.Error),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Root logger instance. */
export const logger = createLogger({ component: 'flowline' });
