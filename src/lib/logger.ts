// ============================================
// Structured JSON logging
// Always includes: timestamp, level, stage, requestId (when available)
// Card numbers are never logged, only their length
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = process.env["NODE_ENV"] === "production" ? "info" : "debug";

/** Drop entries below `level` from here on */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export type Stage = "startup" | "shutdown" | "api";

interface LogContext {
  requestId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  stage?: Stage;
  requestId?: string;
  [key: string]: unknown;
}

function formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(entry);
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) console.log(formatLog("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    if (enabled("info")) console.log(formatLog("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    if (enabled("warn")) console.warn(formatLog("warn", message, context));
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (!enabled("error")) return;
    const { error, ...rest } = context || {};
    const errorInfo = error instanceof Error
      ? { errorMessage: error.message, errorStack: error.stack }
      : error
        ? { errorMessage: String(error) }
        : {};
    console.error(formatLog("error", message, { ...rest, ...errorInfo }));
  },
};

/** Create a logger bound to a specific request */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    debug(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.debug(message, { ...context, requestId, stage });
    },

    info(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.info(message, { ...context, requestId, stage });
    },

    warn(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.warn(message, { ...context, requestId, stage });
    },

    error(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage });
    },
  };
}
