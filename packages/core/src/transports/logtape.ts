/**
 * @callbridge/core - Logtape Transport
 * Forwards bridge log entries to a Logtape (@logtape/logtape) logger.
 *
 * @example
 * ```typescript
 * import { configure, getConsoleSink } from '@logtape/logtape';
 *
 * await configure({
 *   sinks: { console: getConsoleSink() },
 *   loggers: [{ category: 'callbridge', sinks: ['console'], level: 'info' }],
 * });
 *
 * const log = createLogger({ transports: [createLogtapeTransport({ category: ['callbridge', 'host'] })] });
 * ```
 */

import { getLogger } from "@logtape/logtape";
import type { LogEntry } from "../logger.js";
import { LogLevel, type LogLevelName } from "../levels.js";
import type { LogTransport, BaseTransportOptions } from "./types.js";

/**
 * The subset of a Logtape logger this transport calls.
 * `getLogger()` from @logtape/logtape satisfies it.
 */
export interface LogtapeLogger {
  debug(message: string, properties?: Record<string, unknown>): void;
  info(message: string, properties?: Record<string, unknown>): void;
  warn(message: string, properties?: Record<string, unknown>): void;
  error(message: string, properties?: Record<string, unknown>): void;
  fatal(message: string, properties?: Record<string, unknown>): void;
}

type LogtapeMethod = keyof LogtapeLogger;

const LEVEL_MAPPING: Record<LogLevelName, LogtapeMethod> = {
  TRACE: "debug",
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
  FATAL: "fatal",
  SILENT: "debug",
};

/**
 * Logtape transport options
 */
export interface LogtapeTransportOptions extends BaseTransportOptions {
  /** Logtape logger to write to; defaults to `getLogger(category)` */
  logger?: LogtapeLogger;
  /** Category used when no logger is given */
  category?: string | readonly string[];
  /**
   * Include timestamp in properties
   * @default true
   */
  includeTimestamp?: boolean;
}

/**
 * Logtape Transport
 */
export class LogtapeTransport implements LogTransport {
  readonly name = "logtape";

  private readonly logger: LogtapeLogger;
  private readonly includeTimestamp: boolean;
  private readonly enabled: boolean;
  private readonly minLevel: number;

  constructor(options: LogtapeTransportOptions = {}) {
    this.enabled = options.enabled !== false;
    this.includeTimestamp = options.includeTimestamp !== false;
    this.minLevel = options.minLevel ? LogLevel[options.minLevel] : LogLevel.TRACE;
    this.logger = options.logger ?? getLogger(options.category ?? "callbridge");
  }

  log(entry: LogEntry): void {
    if (!this.enabled || entry.levelValue < this.minLevel) return;

    this.logger[LEVEL_MAPPING[entry.level]](entry.message, this.buildProperties(entry));
  }

  private buildProperties(entry: LogEntry): Record<string, unknown> {
    const properties: Record<string, unknown> = {};

    if (this.includeTimestamp && entry.timestamp) {
      properties["timestamp"] = entry.timestamp;
    }

    if (entry.context) {
      Object.assign(properties, entry.context);
    }

    if (entry.error) {
      properties["error"] = { ...entry.error };
    }

    return properties;
  }
}

/**
 * Create a Logtape transport instance.
 */
export function createLogtapeTransport(options?: LogtapeTransportOptions): LogtapeTransport {
  return new LogtapeTransport(options);
}
