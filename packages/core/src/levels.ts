/**
 * Log level constants mapping level names to numeric values.
 * Lower values are more verbose; higher values are more severe.
 */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

/** Log level name string literal type (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, SILENT) */
export type LogLevelName = keyof typeof LogLevel;

/** Numeric log level value type */
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Narrow an arbitrary string to a level name
 */
export function isLogLevelName(value: string | undefined): value is LogLevelName {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevel, value);
}
