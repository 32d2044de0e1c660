import { getContext } from "../middleware/correlationContext";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "cookie"];

const redact = (value: unknown): unknown => {
  if (typeof value !== "object" || value === null) return value;
  if (Array.isArray(value)) return value.map(redact);

  const redacted: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    redacted[key] = SENSITIVE_KEYS.some((k) => key.toLowerCase().includes(k))
      ? "***REDACTED***"
      : redact(inner);
  }
  return redacted;
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  component?: string;
  [key: string]: unknown;
}

export type LoggerContext = {
  component?: string;
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  child(context: LoggerContext): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getConfiguredLogLevel()];
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: LoggerContext,
  metadata?: Record<string, unknown>
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  const traceId = getContext()?.traceId;
  if (traceId) {
    entry.traceId = traceId;
  }

  const { component, ...otherContext } = context;
  if (component) {
    entry.component = component;
  }

  Object.assign(entry, redact(otherContext));
  if (metadata) {
    Object.assign(entry, redact(metadata));
  }

  return entry;
}

function writeLog(entry: LogEntry): void {
  const output = JSON.stringify(entry);

  switch (entry.level) {
    case "error":
      console.error(output);
      break;
    case "warn":
      console.warn(output);
      break;
    case "debug":
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

function createLogMethod(
  level: LogLevel,
  context: LoggerContext
): (message: string, metadata?: Record<string, unknown>) => void {
  return (message, metadata) => {
    if (!shouldLog(level)) return;
    writeLog(formatLogEntry(level, message, context, metadata));
  };
}

function createLoggerWithContext(context: LoggerContext): Logger {
  return {
    debug: createLogMethod("debug", context),
    info: createLogMethod("info", context),
    warn: createLogMethod("warn", context),
    error: createLogMethod("error", context),
    child(childContext: LoggerContext): Logger {
      return createLoggerWithContext({ ...context, ...childContext });
    },
  };
}

export function createLogger(component?: string): Logger {
  return createLoggerWithContext({ component });
}

export const logger = createLogger();
