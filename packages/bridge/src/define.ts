/**
 * @callbridge/bridge - Service Definition
 * Build registration units from method tables
 */

import { errorMessage } from "@callbridge/core";
import { SerializationError } from "./errors.js";
import type {
  CallContext,
  ConnectionHandle,
  InvokerFunction,
  MethodRegistrar,
  RegistrationUnit,
} from "./types.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * What a local handler gets besides its decoded input
 */
export interface HandlerContext {
  connection: ConnectionHandle;
  context: CallContext;
}

/**
 * Method implemented in the bridge process.
 * Input is the decoded JSON payload; the return value is JSON encoded.
 */
export type LocalHandler = (input: unknown, ctx: HandlerContext) => unknown;

/**
 * Method forwarded over the connection unchanged
 */
export interface RemoteMethod {
  readonly kind: "remote";
  /** Name used on the wire; defaults to `<service>.<Method>` */
  readonly remoteName?: string;
}

export type ServiceMethod = LocalHandler | RemoteMethod;

export interface ServiceDefinition {
  /** Service name, e.g. `lnrpc.Lightning` */
  name: string;
  /** Methods keyed by method name */
  methods: Record<string, ServiceMethod>;
}

// ============================================================================
// SERVICE DEFINITION FACTORY
// ============================================================================

/**
 * Mark a method as forwarded to the backend
 */
export function remote(remoteName?: string): RemoteMethod {
  return remoteName === undefined ? { kind: "remote" } : { kind: "remote", remoteName };
}

/**
 * Define a service whose methods register as `<service>.<Method>`
 *
 * @example
 * ```typescript
 * const lightning = defineService({
 *   name: 'lnrpc.Lightning',
 *   methods: {
 *     GetInfo: remote(),
 *     Ping: async () => ({ pong: true }),
 *   },
 * });
 *
 * const registry = buildRegistry([lightning]);
 * ```
 */
export function defineService(definition: ServiceDefinition): RegistrationUnit {
  validateServiceDefinition(definition);

  const entries = Object.entries(definition.methods).map(([method, implementation]) => {
    const fullName = `${definition.name}.${method}`;
    const invoker =
      typeof implementation === "function"
        ? localInvoker(implementation)
        : remoteInvoker(implementation.remoteName ?? fullName);
    return [fullName, invoker] as const;
  });

  return Object.freeze({
    name: definition.name,
    registerInto(registry: MethodRegistrar): void {
      for (const [fullName, invoker] of entries) {
        registry.register(fullName, invoker);
      }
    },
  });
}

/**
 * Registration unit of pass-through methods.
 *
 * @example
 * ```typescript
 * const router = remoteMethods('routerrpc.Router', ['SendPaymentV2', 'TrackPaymentV2']);
 * ```
 */
export function remoteMethods(service: string, names: readonly string[]): RegistrationUnit {
  const methods: Record<string, ServiceMethod> = {};
  for (const name of names) {
    methods[name] = remote();
  }
  return defineService({ name: service, methods });
}

/**
 * Validate service definition
 */
function validateServiceDefinition(definition: ServiceDefinition): void {
  if (!definition.name) {
    throw new Error("Service name is required");
  }

  const serviceRegex = /^[a-zA-Z][a-zA-Z0-9_]*(\.[a-zA-Z][a-zA-Z0-9_]*)*$/;
  if (!serviceRegex.test(definition.name)) {
    throw new Error(
      `Invalid service name: ${definition.name}. Expected dot-separated identifiers`
    );
  }

  const nameRegex = /^[a-zA-Z][a-zA-Z0-9_]*$/;
  for (const name of Object.keys(definition.methods)) {
    if (!nameRegex.test(name)) {
      throw new Error(
        `Invalid method name: ${name}. Must start with letter and contain only alphanumeric and underscore`
      );
    }
  }
}

// ============================================================================
// INVOKERS
// ============================================================================

/**
 * Invoker that forwards the payload to `remoteName` over the connection
 */
export function remoteInvoker(remoteName: string): InvokerFunction {
  return async (context, connection, request, done) => {
    let result: string;
    try {
      result = await connection.call(remoteName, request, { signal: context.signal });
    } catch (error) {
      done("", error instanceof Error ? error : new Error(errorMessage(error)));
      return;
    }
    done(result, null);
  };
}

/**
 * Invoker that decodes JSON, runs a local handler and encodes its result.
 * An empty payload decodes to `undefined`.
 */
export function localInvoker(handler: LocalHandler): InvokerFunction {
  return async (context, connection, request, done) => {
    let input: unknown;
    try {
      input = request.length === 0 ? undefined : JSON.parse(request);
    } catch (error) {
      done("", new SerializationError(`Invalid JSON payload for ${context.method}`, error));
      return;
    }

    let output: unknown;
    try {
      output = await handler(input, { connection, context });
    } catch (error) {
      done("", error instanceof Error ? error : new Error(errorMessage(error)));
      return;
    }

    let encoded: string;
    try {
      encoded = JSON.stringify(output ?? null);
    } catch (error) {
      done("", new SerializationError(`Failed to encode result of ${context.method}`, error));
      return;
    }
    done(encoded, null);
  };
}
