// src/core/log.ts
// Leveled logging over an injectable sink

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogSink = (level: Exclude<LogLevel, "silent">, msg: string, data?: unknown) => void;

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

const consoleSink: LogSink = (level, msg, data) => {
  const line = `[narrc] ${msg}`;
  const write = level === "debug" ? console.debug : level === "info" ? console.info : level === "warn" ? console.warn : console.error;
  if (data === undefined) {
    write(line);
  } else {
    write(line, data);
  }
};

export function createLogger(level: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (at: Exclude<LogLevel, "silent">) => (msg: string, data?: unknown) => {
    if (LEVEL_RANK[at] >= threshold) sink(at, msg, data);
  };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = createLogger("silent");
