// utils/logger.ts - leveled console logging

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Same level, nested scope: `[analyzer:extract]`. */
  child: (scope: string) => Logger;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger. Every line is prefixed with its scope; calls below
 * `level` are dropped. Errors and warnings go to stderr.
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[${scope}]`;
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];

  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
    child: (sub) => createLogger(`${scope}:${sub}`, level),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
