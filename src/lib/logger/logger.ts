import type { LogFormat, LogLevel } from "./schema";

export type LogContext = Record<string, unknown>;

export interface LoggerConfig {
  level: LogLevel;
  format?: LogFormat;
  /** Fields bound to every entry written by this logger. */
  context?: LogContext;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const errorCode = (error: Error): string | undefined => {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

/**
 * bigint fields are common in engine context; JSON.stringify rejects them.
 */
const serializeValue = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error,
): LogEntry => {
  const code = error ? errorCode(error) : undefined;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && Object.keys(context).length > 0 && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(code && { code }),
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
};

export const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${JSON.stringify(entry.context, serializeValue)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry, serializeValue);
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  /** Returns a logger that adds `context` to every entry. */
  child: (context: LogContext) => Logger;
}

export const createLogger = (loggerConfig: LoggerConfig): Logger => {
  const format = loggerConfig.format ?? "json";
  const bound = loggerConfig.context ?? {};

  const merge = (context?: LogContext): LogContext => ({ ...bound, ...context });

  const write = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!shouldLog(level, loggerConfig.level)) {
      return;
    }
    const line = formatLog(createLogEntry(level, message, merge(context), error), format);
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (context) => createLogger({ ...loggerConfig, context: merge(context) }),
  };
};
