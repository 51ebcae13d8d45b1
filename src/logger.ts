/**
 * Level-filtered console logging.
 *
 * Log lines go to stderr so that stdout only carries the statistics report.
 * The level is process-wide and set once from the `-v` count.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "warn";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Map a verbosity count to a log level: 0 → warn, 1 → info, 2+ → debug.
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity <= 0) return "warn";
  if (verbosity === 1) return "info";
  return "debug";
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a logger that prefixes every line with its scope.
 *
 * @example
 * createLogger("scrape").warn("No content div found")
 * // [warn] scrape: No content div found
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string) => {
    if (!isLevelEnabled(level)) return;
    console.error(`[${level}] ${scope}: ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
