/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO;

/**
 * Sets the logging level for the whole process. Called once by the CLI
 * after parsing `--verbose` / `--silent`.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Level-controlled console logger.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /** Always printed, whatever the level. */
  error: (message: string) => {
    console.error(message);
  },
};
