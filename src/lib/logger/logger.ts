import { config } from "../config";

import type { LogLevel } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Fixed context merged into every entry (exchange, component, ...) */
  context?: Record<string, unknown>;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean => {
  const levelValue = logLevels[level];
  const currentLevelValue = logLevels[currentLevel];
  return levelValue >= currentLevelValue;
};

const serializeError = (error: unknown): LogEntry["error"] => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    };
  }
  return { name: "NonError", message: String(error) };
};

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: unknown,
): LogEntry => {
  const hasContext = context !== undefined && Object.keys(context).length > 0;
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(hasContext && { context }),
    ...(error !== undefined && { error: serializeError(error) }),
  };
};

const formatLog = (entry: LogEntry): string => {
  if (config.nodeEnv === "development") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` ${entry.error.name}: ${entry.error.message}` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: unknown, context?: Record<string, unknown>) => void;
  /** Returns a logger that adds `context` to every entry */
  child: (context: Record<string, unknown>) => Logger;
}

/**
 * Creates a logger. Without a config the level is read from the environment
 * on each call, so the shared instance follows `LOG_LEVEL`.
 */
export const createLogger = (loggerConfig?: LoggerConfig): Logger => {
  const baseContext = loggerConfig?.context ?? {};
  const currentLevel = (): LogLevel => loggerConfig?.level ?? config.logging.level;

  const merge = (context?: Record<string, unknown>): Record<string, unknown> => ({
    ...baseContext,
    ...context,
  });

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("debug", currentLevel())) {
        console.log(formatLog(createLogEntry("debug", message, merge(context))));
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("info", currentLevel())) {
        console.log(formatLog(createLogEntry("info", message, merge(context))));
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (shouldLog("warn", currentLevel())) {
        console.warn(formatLog(createLogEntry("warn", message, merge(context))));
      }
    },

    error: (message: string, error?: unknown, context?: Record<string, unknown>): void => {
      if (shouldLog("error", currentLevel())) {
        console.error(formatLog(createLogEntry("error", message, merge(context), error)));
      }
    },

    child: (context: Record<string, unknown>): Logger =>
      createLogger({
        level: currentLevel(),
        ...loggerConfig,
        context: merge(context),
      }),
  };
};

export const logger = createLogger();
