/**
 * @module
 * Dynamic RPC dispatch bridge: a sealed method registry, a single managed
 * backend connection, and callback-based invocation by method name.
 *
 * @example
 * ```typescript
 * import { createBridgeHost, defineService, remote } from '@callbridge/bridge';
 * import { createHttpTransport } from '@callbridge/bridge/transports';
 *
 * const host = createBridgeHost({
 *   transport: createHttpTransport(),
 *   registrations: [
 *     defineService({ name: 'lnrpc.Lightning', methods: { GetInfo: remote() } }),
 *   ],
 * });
 *
 * await host.connectServer('relay.example:443', false, pairingSecret);
 * host.invokeRPC('lnrpc.Lightning.GetInfo', '{}', (result, error) => {
 *   if (error) console.error(error);
 *   else console.log(JSON.parse(result));
 * });
 * ```
 */

export type {
  ConnectionState,
  RemoteCallOptions,
  ConnectionHandle,
  OpenConnectionParams,
  Transport,
  CompletionCallback,
  HostCallback,
  CallContext,
  InvokerFunction,
  InvokeOptions,
  MethodRegistrar,
  RegistrationUnit,
  BridgeConfig,
} from "./types.js";

export {
  RpcError,
  NotConnectedError,
  MethodNotFoundError,
  TransportError,
  InvocationTimeoutError,
  InvocationCancelledError,
  InternalFaultError,
  ConnectionError,
  DuplicateMethodError,
  RegistrySealedError,
  SerializationError,
} from "./errors.js";

export { DEFAULT_BRIDGE_CONFIG, loadConfigFromEnv, validateConfig, mergeConfig } from "./config.js";

export {
  MethodRegistry,
  buildRegistry,
  type MethodResolver,
  type BuildRegistryOptions,
} from "./registry.js";

export {
  createCompletion,
  type Completion,
  type CompletionOptions,
  type InvocationOutcome,
} from "./completion.js";

export { executeWithTimeout, TimeoutExceededError } from "./timeout.js";

export {
  ConnectionManager,
  createConnectionManager,
  type ConnectionManagerOptions,
  type ConnectionStateListener,
} from "./connection.js";

export {
  InvocationBridge,
  createInvocationBridge,
  type ConnectionSource,
  type InvocationBridgeOptions,
} from "./invoke.js";

export {
  createBridgeHost,
  type BridgeHost,
  type BridgeHostOptions,
  type BridgeEntryPoints,
} from "./host.js";

export { serve, type ServeOptions, type StopReason } from "./lifecycle.js";

export {
  defineService,
  remoteMethods,
  remote,
  remoteInvoker,
  localInvoker,
  type ServiceDefinition,
  type ServiceMethod,
  type LocalHandler,
  type RemoteMethod,
  type HandlerContext,
} from "./define.js";
