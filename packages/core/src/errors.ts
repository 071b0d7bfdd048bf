/**
 * @module
 * Base error classes shared by the callbridge packages.
 *
 * @example
 * ```typescript
 * import { ValidationError, errorMessage } from '@callbridge/core';
 *
 * throw new ValidationError('Invalid connect parameters', [
 *   { field: 'serverAddress', message: 'must be host:port' },
 * ]);
 * log.warn('Close failed', { error: errorMessage(cause) });
 * ```
 */

/**
 * Base error class for all callbridge errors.
 * Includes error code, HTTP-style status code, and optional details.
 */
export class BridgeError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "BridgeError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    details: Record<string, unknown> | undefined;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Optional error code for programmatic handling */
  code?: string;
}

/** Input validation failed with one or more field errors (HTTP 400) */
export class ValidationError extends BridgeError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, "VALIDATION_ERROR", 400, { ...details, errors });
    this.name = "ValidationError";
  }
}

/**
 * Human-readable message for a value of unknown shape.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
