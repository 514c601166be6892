// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Where log lines go.
 * - `split`: debug/info to stdout, warn/error to stderr
 * - `stderr`: everything to stderr, keeping stdout free for a JSON summary
 */
export type LogSink = "split" | "stderr";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  sink?: LogSink;
}

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

function severity(level: LogLevel): number {
  return LOG_LEVEL_NAMES.indexOf(level);
}

/**
 * Render one log line, as JSON or as `[timestamp] LEVEL message {meta}`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta,
  json: boolean,
  now: Date = new Date()
): string {
  const timestamp = now.toISOString();

  if (json) {
    const entry: LogEntry = { timestamp, level, message, ...meta };
    return JSON.stringify(entry);
  }

  const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${metaStr}`;
}

/**
 * Create a structured logger for the CLI run.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = severity(options.level);
  const sink = options.sink ?? "split";

  function write(level: LogLevel, line: string): void {
    if (sink === "stderr" || level === "warn" || level === "error") {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function build(defaultMeta: LogMeta): Logger {
    const emit = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
      if (severity(level) < threshold) return;
      write(level, formatLogLine(level, message, { ...defaultMeta, ...meta }, options.json));
    };

    return {
      debug: emit("debug"),
      info: emit("info"),
      warn: emit("warn"),
      error: emit("error"),
      child: (childMeta) => build({ ...defaultMeta, ...childMeta }),
    };
  }

  return build({});
}

/**
 * Create a no-op logger that discards all messages.
 * Used by tests and library callers that don't want output.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
