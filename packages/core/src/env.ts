/**
 * @callbridge/core - Environment Variables
 * Typed access to process environment settings
 */

/**
 * Overrides consulted before `process.env`.
 * Lets embedders (and tests) inject settings without touching the process.
 */
let envOverrides: Record<string, string | undefined> = {};

/**
 * Set environment overrides
 *
 * @example
 * ```typescript
 * setEnvOverrides({ LOG_LEVEL: "DEBUG" });
 * ```
 */
export function setEnvOverrides(env: Record<string, string | undefined>): void {
  envOverrides = { ...envOverrides, ...env };
}

/**
 * Clear environment overrides
 */
export function clearEnvOverrides(): void {
  envOverrides = {};
}

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue: string): string;
export function getEnv(key: string, defaultValue?: string): string | undefined;
export function getEnv(key: string, defaultValue?: string): string | undefined {
  if (key in envOverrides) {
    return envOverrides[key] ?? defaultValue;
  }

  if (typeof process !== "undefined" && process.env) {
    return process.env[key] ?? defaultValue;
  }

  return defaultValue;
}

/**
 * Get an environment variable as a number
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable as a boolean
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = getEnv(key);
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value === "true" || value === "1" || value === "yes";
}

/**
 * Check if running in development mode
 */
export function isDevelopment(): boolean {
  const env = getEnv("NODE_ENV");
  return env === "development" || env === undefined;
}

type EnvConfigItem =
  | { type?: "string"; required?: boolean; default?: string }
  | { type: "number"; required?: boolean; default?: number }
  | { type: "boolean"; required?: boolean; default?: boolean };

type EnvSchema = Record<string, EnvConfigItem>;

type EnvValue<T extends EnvConfigItem> = T extends { type: "number" }
  ? T extends { default: number } | { required: true }
    ? number
    : number | undefined
  : T extends { type: "boolean" }
    ? boolean
    : T extends { default: string } | { required: true }
      ? string
      : string | undefined;

export type EnvResult<T extends EnvSchema> = { [K in keyof T]: EnvValue<T[K]> };

/**
 * Create a typed environment configuration object
 *
 * @example
 * ```typescript
 * const env = createEnvConfig({
 *   CALLBRIDGE_INVOKE_TIMEOUT: { type: "number", default: 0 },
 *   CALLBRIDGE_DEV_MODE: { type: "boolean", default: false },
 * });
 *
 * env.CALLBRIDGE_INVOKE_TIMEOUT // number
 * ```
 */
export function createEnvConfig<const T extends EnvSchema>(schema: T): EnvResult<T> {
  const result: Record<string, string | number | boolean | undefined> = {};

  for (const [key, config] of Object.entries(schema)) {
    let value: string | number | boolean | undefined;

    switch (config.type) {
      case "number":
        value = getEnvNumber(key, config.default);
        break;
      case "boolean":
        value = getEnvBoolean(key, config.default);
        break;
      default:
        value = getEnv(key, config.default);
    }

    if (config.required && (value === undefined || value === "")) {
      throw new Error(`Required environment variable "${key}" is not set`);
    }

    result[key] = value;
  }

  return result as EnvResult<T>;
}
