/**
 * Structured, level-based logging with context.
 *
 * A logger is created per invocation and passed to whatever needs it;
 * nothing here holds process-wide state.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  timestamp: string,
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void,
  info(message: string, context?: Record<string, unknown>): void,
  warn(message: string, context?: Record<string, unknown>): void,
  error(message: string, context?: Record<string, unknown>): void,
  child(context: Record<string, unknown>): Logger,
}

export interface LoggerProps {
  context?: Record<string, unknown>,
  minLevel?: LogLevel,
  sink?: LogSink,
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Writes one JSON line per entry to the console. */
export const consoleSink: LogSink = (entry: LogEntry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  switch (entry.level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export function parseLogLevel (value: string | undefined, fallback = LogLevel.Info): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const level = Object.values(LogLevel).find(candidate => candidate === normalized);
  return level ?? fallback;
}

export function createLogger (loggerProps: LoggerProps = {}): Logger {
  const baseContext = loggerProps.context ?? {};
  const minLevel = loggerProps.minLevel ?? LogLevel.Info;
  const sink = loggerProps.sink ?? consoleSink;
  const log = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    sink({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date().toISOString(),
    });
  };
  return {
    debug: (message, context) => log(LogLevel.Debug, message, context),
    info: (message, context) => log(LogLevel.Info, message, context),
    warn: (message, context) => log(LogLevel.Warn, message, context),
    error: (message, context) => log(LogLevel.Error, message, context),
    child: (context) => createLogger({
      context: { ...baseContext, ...context },
      minLevel,
      sink,
    }),
  };
}
