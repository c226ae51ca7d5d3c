/**
 * Scoped console logging
 *
 * Every line is prefixed with its scope, e.g. `[renderer] ...`. The minimum
 * level comes from LOG_LEVEL (debug, info, warn, error, silent) and can be
 * changed at run time with setLogLevel().
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger for a nested scope, e.g. `layout:grid_2x2` */
  child(scope: string): Logger;
}

/**
 * Parse a level name; unknown or missing values give `fallback`
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    case "silent":
    case "none":
      return "silent";
    default:
      return fallback;
  }
}

let minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Create a logger for a module scope
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    scope,
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`);
    },
  };
}
