import type { LogFormat, LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  format?: LogFormat;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
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

const getErrorCode = (error: Error): string | undefined =>
  "code" in error && typeof error.code === "string" ? error.code : undefined;

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const code = error ? getErrorCode(error) : undefined;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
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

/**
 * JSON.stringify replacer that keeps bigint values (token ids, raw liquidity)
 * readable instead of throwing.
 */
const replacer = (_key: string, value: unknown): unknown =>
  typeof value === "bigint" ? value.toString() : value;

const formatLog = (entry: LogEntry, format: LogFormat): string => {
  if (format === "pretty") {
    const context = entry.context ? ` ${JSON.stringify(entry.context, replacer)}` : "";
    const error = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : "";
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${context}${error}`;
  }
  return JSON.stringify(entry, replacer);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

export const createLogger = (loggerConfig: LoggerConfig): Logger => {
  const format = loggerConfig.format ?? "json";

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("debug", message, context), format));
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", loggerConfig.level)) {
        console.log(formatLog(createLogEntry("info", message, context), format));
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", loggerConfig.level)) {
        console.warn(formatLog(createLogEntry("warn", message, context), format));
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (shouldLog("error", loggerConfig.level)) {
        console.error(formatLog(createLogEntry("error", message, context, error), format));
      }
    },
  };
};

/**
 * Normalize an unknown thrown value into an Error for logging.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
