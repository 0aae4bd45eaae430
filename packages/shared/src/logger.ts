/**
 * Structured logging utility.
 *
 * Human-readable lines for local development, one JSON object per line
 * otherwise (GCP Cloud Logging compatible).
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string;
  data?: unknown;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  child(scope: string): Logger;
}

const isLocalDevelopment = () =>
  process.env.LOCAL_DEVELOPMENT?.toLowerCase() === "true";

export function formatLog(entry: LogEntry, pretty: boolean): string {
  const message = entry.scope
    ? `[${entry.scope}] ${entry.message}`
    : entry.message;

  if (pretty) {
    const prefix = {
      debug: "🔍",
      info: "ℹ️ ",
      warn: "⚠️ ",
      error: "❌",
    }[entry.level];

    const dataStr =
      entry.data !== undefined ? ` ${JSON.stringify(entry.data)}` : "";
    return `${prefix} [${entry.timestamp}] ${message}${dataStr}`;
  }

  return JSON.stringify({
    severity: entry.level.toUpperCase(),
    message,
    timestamp: entry.timestamp,
    ...(entry.data !== undefined ? { data: entry.data } : {}),
  });
}

export function serializeError(error: unknown): unknown {
  return error instanceof Error
    ? { name: error.name, message: error.message, stack: error.stack }
    : error;
}

export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown) => {
    const line = formatLog(
      { level, message, timestamp: new Date().toISOString(), scope, data },
      isLocalDevelopment(),
    );
    console[level](line);
  };

  return {
    debug(message, data) {
      if (isLocalDevelopment()) {
        write("debug", message, data);
      }
    },
    info(message, data) {
      write("info", message, data);
    },
    warn(message, data) {
      write("warn", message, data);
    },
    error(message, error) {
      write("error", message, serializeError(error));
    },
    child(childScope) {
      return createLogger(scope ? `${scope}:${childScope}` : childScope);
    },
  };
}

export const logger = createLogger();
