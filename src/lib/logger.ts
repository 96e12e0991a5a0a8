export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const order: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "warn";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export type Logger = {
  debug: (message: string, ...rest: unknown[]) => void;
  info: (message: string, ...rest: unknown[]) => void;
  warn: (message: string, ...rest: unknown[]) => void;
  error: (message: string, ...rest: unknown[]) => void;
};

/**
 * Scoped console logger. Every line is prefixed with the scope so output
 * from several grids can be told apart, e.g. `grid[1] garbage: queue full`.
 */
export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => order[level] >= order[threshold];
  return {
    debug: (message, ...rest) => {
      if (enabled("debug")) console.debug(`${scope}: ${message}`, ...rest);
    },
    info: (message, ...rest) => {
      if (enabled("info")) console.info(`${scope}: ${message}`, ...rest);
    },
    warn: (message, ...rest) => {
      if (enabled("warn")) console.warn(`${scope}: ${message}`, ...rest);
    },
    error: (message, ...rest) => {
      if (enabled("error")) console.error(`${scope}: ${message}`, ...rest);
    },
  };
}
