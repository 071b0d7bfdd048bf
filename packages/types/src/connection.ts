/**
 * @callbridge/types - Connection Schemas
 * Arguments accepted by connectServer and the pairing handshake reply
 */

import { type } from "arktype";
import { toIssues, type ValidationResult } from "./validate.js";

// ============================================================================
// Address
// ============================================================================

const HOST_PORT = /^(?:\[[0-9A-Fa-f:.]+\]|[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?):\d{1,5}$/;

/**
 * Backend address in `host:port` form.
 * IPv6 hosts are bracketed: `[::1]:10009`.
 */
export const serverAddress = type(HOST_PORT).narrow((address, ctx) => {
  const port = Number(address.slice(address.lastIndexOf(":") + 1));
  return (port >= 1 && port <= 65535) || ctx.mustBe("an address with a port between 1 and 65535");
});

// ============================================================================
// Connect parameters
// ============================================================================

/** Parameters of a connect request */
export const connectParams = type({
  serverAddress,
  insecure: "boolean",
  secret: "string >= 1",
});

export type ConnectParams = typeof connectParams.infer;

/**
 * Validate connect parameters
 */
export function checkConnectParams(input: unknown): ValidationResult<ConnectParams> {
  const out = connectParams(input);
  if (out instanceof type.errors) {
    return { success: false, issues: toIssues(out) };
  }
  return { success: true, data: out };
}

// ============================================================================
// Pairing handshake
// ============================================================================

/** Body returned by a relay after a successful pairing */
export const pairingResponse = type({
  sessionId: "string >= 1",
  "expiresAt?": "string",
});

export type PairingResponse = typeof pairingResponse.infer;

/**
 * Validate a pairing reply
 */
export function parsePairingResponse(input: unknown): ValidationResult<PairingResponse> {
  const out = pairingResponse(input);
  if (out instanceof type.errors) {
    return { success: false, issues: toIssues(out) };
  }
  return { success: true, data: out };
}
