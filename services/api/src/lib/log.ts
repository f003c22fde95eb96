// Everything goes to stderr; stdout carries the CLI's JSON output.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((l) => l === value);
}

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
};

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(threshold)) return;
    console.error(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`);
  };
  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m, err) => {
      write("error", m);
      if (err instanceof Error && err.stack && threshold === "debug") console.error(err.stack);
    }
  };
}
