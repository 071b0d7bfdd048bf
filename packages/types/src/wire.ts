/**
 * @callbridge/types - Wire Envelopes
 * Response bodies returned by an RPC relay.
 * Payloads stay opaque strings; only the envelope is checked.
 */

import { type } from "arktype";
import { toIssues, type ValidationResult } from "./validate.js";

/** Error reported by the remote side */
export const rpcErrorBody = type({
  code: "string",
  message: "string",
  "retryable?": "boolean",
});

export type RpcErrorBody = typeof rpcErrorBody.infer;

/** Successful reply */
export const rpcSuccessEnvelope = type({
  result: "string",
});

/** Failed reply */
export const rpcFailureEnvelope = type({
  error: rpcErrorBody,
});

/** Either reply */
export const rpcResponseEnvelope = rpcSuccessEnvelope.or(rpcFailureEnvelope);

export type RpcResponseEnvelope = typeof rpcResponseEnvelope.infer;

/**
 * Validate a reply body
 */
export function parseRpcResponse(input: unknown): ValidationResult<RpcResponseEnvelope> {
  const out = rpcResponseEnvelope(input);
  if (out instanceof type.errors) {
    return { success: false, issues: toIssues(out) };
  }
  return { success: true, data: out };
}
