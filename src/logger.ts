/**
 * Structured JSON-line logger with timestamp, level and bound context (requestId, sellerId).
 * Level comes from LOG_LEVEL via config; tests use `silentLogger` or a capturing sink.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that always includes `context` in its records */
  child(context: LogMeta): Logger;
}

/** Receives one formatted line per record */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
  context?: LogMeta;
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function serializeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? consoleSink;
  const context = options.context ?? {};

  function log(level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta): void {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const record = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...serializeMeta({ ...context, ...meta }),
    };
    sink(level, JSON.stringify(record));
  }

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (extra) => createLogger({ ...options, context: { ...context, ...extra } }),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
