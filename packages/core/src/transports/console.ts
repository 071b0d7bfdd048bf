/**
 * @callbridge/core - Console Transport
 *
 * Default log transport. Pretty, colored lines in development and
 * one JSON object per line otherwise.
 */

import { supportsColor } from "../runtime.js";
import { isDevelopment } from "../env.js";
import type { LogEntry } from "../logger.js";
import { LogLevel, type LogLevelName } from "../levels.js";
import type { BaseTransportOptions, LogTransport } from "./types.js";

/**
 * Console transport options
 */
export interface ConsoleTransportOptions extends BaseTransportOptions {
  /** Enable pretty printing (default: true in development) */
  pretty?: boolean;
  /** Enable ANSI colors (default: when stdout is a TTY) */
  colors?: boolean;
}

const LEVEL_COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m",
  DEBUG: "\x1b[36m",
  INFO: "\x1b[32m",
  WARN: "\x1b[33m",
  ERROR: "\x1b[31m",
  FATAL: "\x1b[35m",
  SILENT: "",
};

const RESET = "\x1b[0m";

/**
 * Console transport
 */
export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;
  private readonly enabled: boolean;
  private readonly minLevel: number;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? supportsColor();
    this.enabled = options.enabled !== false;
    this.minLevel = options.minLevel ? LogLevel[options.minLevel] : LogLevel.TRACE;
  }

  log(entry: LogEntry): void {
    if (!this.enabled || entry.levelValue < this.minLevel) return;

    if (this.pretty) {
      this.logPretty(entry);
    } else {
      this.logJson(entry);
    }
  }

  /**
   * Format an entry as a single JSON line
   */
  formatJson(entry: LogEntry): string {
    const { level, message, timestamp, context, error } = entry;

    const output: Record<string, unknown> = {
      level,
      time: timestamp,
      msg: message,
    };

    if (context && Object.keys(context).length > 0) {
      Object.assign(output, context);
    }

    if (error) {
      output["err"] = error;
    }

    return JSON.stringify(output);
  }

  private logJson(entry: LogEntry): void {
    console.log(this.formatJson(entry));
  }

  private logPretty(entry: LogEntry): void {
    const { level, message, timestamp, context, error } = entry;

    const color = this.colors ? LEVEL_COLORS[level] : "";
    const resetCode = this.colors ? RESET : "";

    // HH:MM:SS from the ISO timestamp
    const timePart = timestamp.split("T")[1];
    const time = timePart ? timePart.slice(0, 8) : timestamp;

    let output = `${color}[${time}] ${level.padEnd(5)}${resetCode} ${message}`;

    if (context && Object.keys(context).length > 0) {
      output += ` ${JSON.stringify(context)}`;
    }

    if (level === "ERROR" || level === "FATAL") {
      console.error(output);
      if (error?.stack) {
        console.error(error.stack);
      }
    } else if (level === "WARN") {
      console.warn(output);
    } else if (level === "DEBUG" || level === "TRACE") {
      console.debug(output);
    } else {
      console.log(output);
    }
  }
}
