/**
 * @module
 * Runtime validation schemas for callbridge, built on ArkType.
 *
 * @example
 * ```typescript
 * import { checkConnectParams } from '@callbridge/types';
 *
 * const result = checkConnectParams({ serverAddress: 'relay.example:443', insecure: false, secret: 'test-secret' });
 * if (!result.success) {
 *   console.error(result.issues);
 * }
 * ```
 */

export { type } from "arktype";
export type { Type, ArkErrors } from "arktype";

export {
  toIssues,
  type ValidationIssue,
  type ValidationResult,
} from "./validate.js";

export {
  serverAddress,
  connectParams,
  checkConnectParams,
  pairingResponse,
  parsePairingResponse,
  type ConnectParams,
  type PairingResponse,
} from "./connection.js";

export {
  rpcErrorBody,
  rpcSuccessEnvelope,
  rpcFailureEnvelope,
  rpcResponseEnvelope,
  parseRpcResponse,
  type RpcErrorBody,
  type RpcResponseEnvelope,
} from "./wire.js";

export { bridgeConfig, checkBridgeConfig, type BridgeConfigShape } from "./config.js";
