/**
 * @callbridge/bridge - Method Registry
 * Name → invoker mapping, filled once at startup and sealed before use
 */

import type { Logger } from "@callbridge/core";
import { createLogger } from "@callbridge/core";
import { DuplicateMethodError, MethodNotFoundError, RegistrySealedError } from "./errors.js";
import type { InvokerFunction, MethodRegistrar, RegistrationUnit } from "./types.js";

/**
 * Read side of a sealed registry
 */
export interface MethodResolver {
  resolve(name: string): InvokerFunction | undefined;
  has(name: string): boolean;
  names(): string[];
  readonly size: number;
}

/**
 * Append-only method registry.
 * Names are unique; registering a name twice is an error.
 */
export class MethodRegistry implements MethodRegistrar, MethodResolver {
  private readonly methods = new Map<string, InvokerFunction>();
  private sealed = false;
  private currentUnit: string | undefined;

  /**
   * Register a method
   */
  register(name: string, invoker: InvokerFunction): void {
    if (this.sealed) {
      throw new RegistrySealedError(name);
    }
    if (name.length === 0) {
      throw new TypeError("Method name must be a non-empty string");
    }
    if (this.methods.has(name)) {
      throw new DuplicateMethodError(name, this.currentUnit);
    }
    this.methods.set(name, invoker);
  }

  /**
   * Apply a registration unit. Errors name the unit being applied.
   */
  apply(unit: RegistrationUnit): void {
    if (this.sealed) {
      throw new RegistrySealedError(`unit ${unit.name}`);
    }
    this.currentUnit = unit.name;
    try {
      unit.registerInto(this);
    } finally {
      this.currentUnit = undefined;
    }
  }

  /**
   * Get the invoker for a method
   */
  resolve(name: string): InvokerFunction | undefined {
    return this.methods.get(name);
  }

  /**
   * Get the invoker for a method, throwing if absent
   */
  require(name: string): InvokerFunction {
    const invoker = this.methods.get(name);
    if (!invoker) {
      throw new MethodNotFoundError(name);
    }
    return invoker;
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  /**
   * Registered names in registration order
   */
  names(): string[] {
    return Array.from(this.methods.keys());
  }

  get size(): number {
    return this.methods.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Stop accepting registrations.
   * The returned view has no write methods.
   */
  seal(): MethodResolver {
    this.sealed = true;
    return this;
  }
}

export interface BuildRegistryOptions {
  logger?: Logger;
}

/**
 * Apply registration units in order and seal the result.
 *
 * @example
 * ```typescript
 * const registry = buildRegistry([lightning, router, walletKit]);
 * registry.has("lnrpc.Lightning.GetInfo"); // true
 * ```
 */
export function buildRegistry(
  units: readonly RegistrationUnit[],
  options: BuildRegistryOptions = {}
): MethodResolver {
  const logger = options.logger ?? createLogger({ name: "registry" });
  const registry = new MethodRegistry();

  for (const unit of units) {
    const before = registry.size;
    registry.apply(unit);
    logger.debug(`Registered ${unit.name}`, { methods: registry.size - before });
  }

  logger.info("Method registry sealed", { units: units.length, methods: registry.size });
  return registry.seal();
}
