/**
 * @callbridge/types - Bridge Configuration Schema
 */

import { type } from "arktype";
import { toIssues, type ValidationResult } from "./validate.js";

/**
 * Timeouts in milliseconds; 0 disables the corresponding timeout.
 */
export const bridgeConfig = type({
  invokeTimeout: "number.integer >= 0",
  connectTimeout: "number.integer >= 0",
  closeTimeout: "number.integer >= 0",
});

export type BridgeConfigShape = typeof bridgeConfig.infer;

/**
 * Validate a complete bridge configuration
 */
export function checkBridgeConfig(input: unknown): ValidationResult<BridgeConfigShape> {
  const out = bridgeConfig(input);
  if (out instanceof type.errors) {
    return { success: false, issues: toIssues(out) };
  }
  return { success: true, data: out };
}
