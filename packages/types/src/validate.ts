/**
 * @callbridge/types - Validation helpers
 * Turn ArkType results into plain success/issue objects
 */

import type { ArkErrors } from "arktype";

/**
 * A single validation failure
 */
export interface ValidationIssue {
  /** Dotted path of the offending field, or "root" */
  path: string;
  /** Human-readable description from ArkType */
  message: string;
}

/**
 * Result of validating untrusted input
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; issues: ValidationIssue[] };

/**
 * Format ArkType errors as issue objects.
 *
 * @example
 * ```typescript
 * const out = connectParams(input);
 * if (out instanceof type.errors) {
 *   toIssues(out); // [{ path: "serverAddress", message: "..." }]
 * }
 * ```
 */
export function toIssues(errors: ArkErrors): ValidationIssue[] {
  return errors.map((error) => ({
    path: error.path.map(String).join(".") || "root",
    message: error.message,
  }));
}
