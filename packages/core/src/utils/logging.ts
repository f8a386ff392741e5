/**
 * Centralized logging utility with configurable log levels
 */

// Log levels in order of verbosity
export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4
}

/**
 * Parse a log level from a string such as the LOG_LEVEL variable.
 * Returns null when the value is not a level between NONE and DEBUG.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (value === undefined || value.trim() === "") {
    return null;
  }
  const level = Number(value);
  if (!Number.isInteger(level) || level < LogLevel.NONE || level > LogLevel.DEBUG) {
    return null;
  }
  return level;
}

// Default log level - can be overridden via environment variable
let currentLogLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;

/**
 * Set the current log level
 * @param level The log level to set
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
  debug(`Log level set to: ${LogLevel[level]}`);
}

/**
 * Get the current log level
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Log an error message
 */
export function error(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.ERROR) {
    console.error("[ERROR]", ...args);
  }
}

/**
 * Log a warning message
 */
export function warn(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.WARN) {
    console.warn("[WARN]", ...args);
  }
}

/**
 * Log an info message
 */
export function info(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.INFO) {
    console.log(...args);
  }
}

/**
 * Log a debug message
 */
export function debug(...args: unknown[]): void {
  if (currentLogLevel >= LogLevel.DEBUG) {
    console.log("[DEBUG]", ...args);
  }
}
