import type { LogLevel } from "./types/index.js";

export type Logger = {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
};

const LEVELS: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

/**
 * Leveled console logger. Messages above `level` are dropped; errors and warnings go
 * to stderr, the rest to stdout.
 */
export function createLogger(level: LogLevel = "warn", prefix = "scoped-rules"): Logger {
  const threshold = LEVELS[level];

  const write = (messageLevel: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVELS[messageLevel] > threshold) return;
    const tag = `[${prefix}:${messageLevel}]`;
    if (messageLevel === "error") {
      console.error(tag, message);
    } else if (messageLevel === "warn") {
      console.warn(tag, message);
    } else {
      console.log(tag, message);
    }
  };

  return {
    error: (message) => write("error", message),
    warn: (message) => write("warn", message),
    info: (message) => write("info", message),
    debug: (message) => write("debug", message),
  };
}

export const silentLogger: Logger = createLogger("silent");
