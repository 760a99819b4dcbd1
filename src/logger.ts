export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

/** Subset of `console` the logger writes through. */
export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
  const enabled = (l: LogLevel) => rank[l] >= rank[level];
  const line = (l: LogLevel, message: string) => `${new Date().toISOString()} - ${l.toUpperCase()} - ${message}`;

  return {
    debug(message) {
      if (enabled("debug")) sink.log(line("debug", message));
    },
    info(message) {
      if (enabled("info")) sink.log(line("info", message));
    },
    warn(message) {
      if (enabled("warn")) sink.warn(line("warn", message));
    },
    error(message, err) {
      if (!enabled("error")) return;
      if (err === undefined) sink.error(line("error", message));
      else sink.error(line("error", message), err);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
