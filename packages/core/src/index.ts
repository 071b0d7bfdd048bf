/**
 * @module
 * Shared foundations for the callbridge packages: runtime detection,
 * environment access, structured logging, base errors and small async helpers.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnvNumber, BridgeError, createDeferred } from '@callbridge/core';
 *
 * const log = createLogger({ name: 'bridge' });
 * const timeout = getEnvNumber('CALLBRIDGE_INVOKE_TIMEOUT', 0);
 * ```
 */

import { randomUUID } from "node:crypto";

// ============================================
// RUNTIME & ENVIRONMENT
// ============================================

export {
  detectRuntime,
  runtime,
  supportsColor,
  type Runtime,
} from "./runtime.js";

export {
  getEnv,
  getEnvNumber,
  getEnvBoolean,
  setEnvOverrides,
  clearEnvOverrides,
  isDevelopment,
  createEnvConfig,
  type EnvResult,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  ConsoleTransport,
  LogLevel,
  isLogLevelName,
  createLogger,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type ErrorInfo,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportOptions,
} from "./logger.js";

export {
  LogtapeTransport,
  createLogtapeTransport,
  type LogtapeTransportOptions,
  type LogtapeLogger,
  type BaseTransportOptions,
} from "./transports/index.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";

// ============================================
// UTILITY FUNCTIONS
// ============================================

/**
 * Generate a UUID v4.
 *
 * @example
 * ```typescript
 * const id = generateId(); // "550e8400-e29b-41d4-a716-446655440000"
 * ```
 */
export function generateId(): string {
  return randomUUID();
}

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * A promise together with the functions that settle it.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
}

/**
 * Create a deferred promise
 */
export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason?: unknown) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
