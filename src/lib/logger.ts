/**
 * Logger injected into every component that reports progress.
 * Console-backed, `[Tag]`-prefixed lines; tests use `silentLogger`.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Same sink and level, different tag. */
  child(tag: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

const consoleSink: LogSink = {
  write(level, line) {
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  },
};

function formatContext(context?: LogContext): string {
  if (!context) return "";
  const parts = Object.entries(context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return parts.length ? ` ${parts.join(" ")}` : "";
}

export function createLogger(
  tag: string,
  minLevel: LogLevel = "info",
  sink: LogSink = consoleSink,
): Logger {
  const emit = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    const ts = new Date().toISOString().replace("T", " ").slice(0, 19);
    sink.write(level, `[${ts}] ${level.toUpperCase()} [${tag}] ${message}${formatContext(context)}`);
  };
  return {
    debug: (m, c) => emit("debug", m, c),
    info: (m, c) => emit("info", m, c),
    warn: (m, c) => emit("warn", m, c),
    error: (m, c) => emit("error", m, c),
    child: (childTag) => createLogger(childTag, minLevel, sink),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/** Truncate long diagnosis names for single-line progress output. */
export function shorten(text: string, max = 30): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
