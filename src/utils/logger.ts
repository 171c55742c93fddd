/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const PREFIX = '[outline-porter]';

let currentLogLevel: LogLevel = LogLevel.WARN;

/**
 * Sets the current logging level for the application.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Level-gated logger. Everything goes to stderr: stdout carries the
 * converted text.
 */
export const logger = {
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.error(`${PREFIX} ${message}`);
    }
  },
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.error(`${PREFIX} ${message}`);
    }
  },
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(`${PREFIX} ${message}`);
    }
  },
  /** Always logged. */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(`${PREFIX} ${message}`);
    }
  },
};
