/**
 * @callbridge/bridge - Configuration
 * Default configuration and config utilities
 */

import { createEnvConfig, ValidationError } from "@callbridge/core";
import { checkBridgeConfig } from "@callbridge/types";
import type { BridgeConfig } from "./types.js";

/**
 * Default bridge configuration.
 * Invocations have no timeout; connects give up after 15s, closes after 5s.
 */
export const DEFAULT_BRIDGE_CONFIG: Readonly<BridgeConfig> = Object.freeze({
  invokeTimeout: 0,
  connectTimeout: 15_000,
  closeTimeout: 5_000,
});

/**
 * Read overrides from the environment.
 *
 * - `CALLBRIDGE_INVOKE_TIMEOUT`
 * - `CALLBRIDGE_CONNECT_TIMEOUT`
 * - `CALLBRIDGE_CLOSE_TIMEOUT`
 */
export function loadConfigFromEnv(): BridgeConfig {
  const env = createEnvConfig({
    CALLBRIDGE_INVOKE_TIMEOUT: { type: "number", default: DEFAULT_BRIDGE_CONFIG.invokeTimeout },
    CALLBRIDGE_CONNECT_TIMEOUT: { type: "number", default: DEFAULT_BRIDGE_CONFIG.connectTimeout },
    CALLBRIDGE_CLOSE_TIMEOUT: { type: "number", default: DEFAULT_BRIDGE_CONFIG.closeTimeout },
  });

  return {
    invokeTimeout: env.CALLBRIDGE_INVOKE_TIMEOUT,
    connectTimeout: env.CALLBRIDGE_CONNECT_TIMEOUT,
    closeTimeout: env.CALLBRIDGE_CLOSE_TIMEOUT,
  };
}

/**
 * Validate bridge configuration.
 *
 * @throws ValidationError listing every invalid field
 */
export function validateConfig(config: BridgeConfig): BridgeConfig {
  const result = checkBridgeConfig(config);
  if (!result.success) {
    throw new ValidationError(
      "Invalid bridge configuration",
      result.issues.map((issue) => ({ field: issue.path, message: issue.message }))
    );
  }
  return result.data;
}

/**
 * Merge user config over environment values and defaults, then validate.
 *
 * @example
 * ```typescript
 * const config = mergeConfig({ invokeTimeout: 30_000 });
 * ```
 */
export function mergeConfig(userConfig?: Partial<BridgeConfig>): BridgeConfig {
  return validateConfig({
    ...loadConfigFromEnv(),
    ...userConfig,
  });
}
