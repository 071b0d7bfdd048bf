/**
 * @module
 * Structured logging for the bridge.
 * Entries are handed to pluggable transports (console by default, or Logtape).
 *
 * @example
 * ```typescript
 * import { createLogger } from '@callbridge/core';
 *
 * const log = createLogger({ name: 'bridge', level: 'DEBUG' });
 *
 * log.info('Connected', { address: 'relay.example:443' });
 * log.error('Invocation failed', error, { method: 'lnrpc.Lightning.GetInfo' });
 *
 * const callLog = log.child({ requestId: 'abc123' });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";
import { LogLevel, isLogLevelName, type LogLevelName, type LogLevelValue } from "./levels.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

export { LogLevel, isLogLevelName, type LogLevelName, type LogLevelValue } from "./levels.js";

/**
 * Structured error information included in log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
}

/**
 * Structured log entry passed to transports.
 */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 timestamp, or "" when timestamps are disabled */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerConfig {
  /** Minimum log level (defaults to LOG_LEVEL, then INFO) */
  level: LogLevelName;
  /** Logger name, emitted as the `module` context field */
  name: string;
  /** Base context added to all logs */
  context: Record<string, unknown>;
  /** Custom transports */
  transports: LogTransport[];
  /** Pretty print (console transport only) */
  pretty: boolean;
  /** Extra fields to redact */
  redact: string[];
  /** Timestamp format */
  timestamp: boolean | (() => string);
}

function resolveLevel(level: LogLevelName | undefined): LogLevelValue {
  if (level) return LogLevel[level];
  const fromEnv = getEnv("LOG_LEVEL")?.toUpperCase();
  return isLogLevelName(fromEnv) ? LogLevel[fromEnv] : LogLevel.INFO;
}

function levelName(value: LogLevelValue): LogLevelName {
  const entry = Object.entries(LogLevel).find(([, v]) => v === value);
  const name = entry?.[0];
  return isLogLevelName(name) ? name : "INFO";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Redact sensitive fields from context.
 * Supports dotted paths such as "request.secret".
 */
function redactFields(
  obj: Record<string, unknown>,
  fields: string[]
): Record<string, unknown> {
  const result = { ...obj };
  for (const field of fields) {
    const parts = field.split(".");
    if (parts.length === 1) {
      if (field in result) {
        result[field] = "[REDACTED]";
      }
      continue;
    }

    let current: Record<string, unknown> = result;
    let found = true;
    for (const part of parts.slice(0, -1)) {
      const next = current[part];
      if (!isRecord(next)) {
        found = false;
        break;
      }
      // copy on write so callers' objects are left untouched
      const copy = { ...next };
      current[part] = copy;
      current = copy;
    }
    const last = parts[parts.length - 1];
    if (found && last !== undefined && last in current) {
      current[last] = "[REDACTED]";
    }
  }
  return result;
}

const DEFAULT_REDACT_FIELDS = [
  "password",
  "secret",
  "pairingSecret",
  "pairingPhrase",
  "token",
  "sessionId",
  "authorization",
  "apiKey",
];

/**
 * Structured logger with support for multiple transports and redaction.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ name: 'bridge', level: 'DEBUG' });
 * logger.info('Invocation scheduled', { method: 'GetInfo' });
 * ```
 */
export class Logger {
  private readonly level: LogLevelValue;
  private readonly name: string | undefined;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];
  private readonly redactFields: string[];
  private readonly timestampFn: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.level = resolveLevel(config.level);
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty !== undefined ? { pretty: config.pretty } : {}),
    ];
    this.redactFields = [...new Set([...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])])];

    if (config.timestamp === false) {
      this.timestampFn = () => "";
    } else if (typeof config.timestamp === "function") {
      this.timestampFn = config.timestamp;
    } else {
      this.timestampFn = () => new Date().toISOString();
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    const config: Partial<LoggerConfig> = {
      level: levelName(this.level),
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.timestampFn,
    };
    if (this.name !== undefined) {
      config.name = this.name;
    }
    return new Logger(config);
  }

  /**
   * Whether entries at the given level would reach the transports
   */
  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this.level && this.level !== LogLevel.SILENT;
  }

  private log(
    level: LogLevelName,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    let finalContext = { ...this.context };
    if (this.name) {
      finalContext["module"] = this.name;
    }
    if (context) {
      finalContext = { ...finalContext, ...context };
    }

    finalContext = redactFields(finalContext, this.redactFields);

    const entry: LogEntry = {
      level,
      levelValue: LogLevel[level],
      message,
      timestamp: this.timestampFn(),
      context: Object.keys(finalContext).length > 0 ? finalContext : undefined,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
    };

    for (const transport of this.transports) {
      const pending = transport.log(entry);
      if (pending instanceof Promise) {
        pending.catch((transportError: unknown) => {
          console.error(`Log transport "${transport.name}" failed:`, transportError);
        });
      }
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("TRACE", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("DEBUG", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("INFO", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("WARN", message, context);
  }

  /**
   * Log an error message with optional Error object.
   * A plain object in the second position is treated as context.
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("ERROR", message, context, error);
    } else if (isRecord(error)) {
      this.log("ERROR", message, { ...error, ...context });
    } else if (error !== undefined) {
      this.log("ERROR", message, { error: String(error), ...context });
    } else {
      this.log("ERROR", message, context);
    }
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (error instanceof Error) {
      this.log("FATAL", message, context, error);
    } else if (isRecord(error)) {
      this.log("FATAL", message, { ...error, ...context });
    } else {
      this.log("FATAL", message, context);
    }
  }

  /**
   * Flush every transport that buffers
   */
  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }
}

/**
 * Create a new Logger instance with the specified configuration.
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}
