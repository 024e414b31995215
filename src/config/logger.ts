import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(level: LogLevel): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;
  return {
    debug(message) {
      if (enabled("debug")) console.log(`${chalk.gray("[DEBUG]")} ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`${chalk.blue("[INFO]")} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`${chalk.red("[ERROR]")} ${message}`);
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
