export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levels, value);
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return levels[currentLevel] <= levels[level];
}

export type Logger = {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
};

export const logger: Logger = {
  debug(...args: unknown[]) {
    if (enabled("debug")) console.log(...args);
  },
  info(...args: unknown[]) {
    if (enabled("info")) console.log(...args);
  },
  warn(...args: unknown[]) {
    if (enabled("warn")) console.warn(...args);
  },
  error(...args: unknown[]) {
    if (enabled("error")) console.error(...args);
  },
};

/**
 * Logger whose lines start with `[reload-serve <scope>]`.
 */
export function scopedLogger(scope?: string): Logger {
  const prefix = scope ? `[reload-serve ${scope}]` : "[reload-serve]";
  return {
    debug: (...args) => logger.debug(prefix, ...args),
    info: (...args) => logger.info(prefix, ...args),
    warn: (...args) => logger.warn(prefix, ...args),
    error: (...args) => logger.error(prefix, ...args),
  };
}
