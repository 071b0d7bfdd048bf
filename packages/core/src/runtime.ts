/**
 * @callbridge/core - Runtime Detection
 * Identifies the JavaScript host the bridge is embedded in
 */

export type Runtime = "node" | "deno" | "bun" | "browser" | "unknown";

/**
 * Detect the current JavaScript runtime
 */
export function detectRuntime(): Runtime {
  // Bun check (must be before Node since Bun also has process)
  if ("Bun" in globalThis) {
    return "bun";
  }

  if ("Deno" in globalThis) {
    return "deno";
  }

  if ("window" in globalThis && "document" in globalThis) {
    return "browser";
  }

  if (typeof process !== "undefined" && typeof process.versions?.node === "string") {
    return "node";
  }

  return "unknown";
}

/**
 * Current runtime (cached)
 */
export const runtime = detectRuntime();

/**
 * Whether the host terminal can render ANSI colors
 */
export function supportsColor(): boolean {
  if (runtime !== "node" && runtime !== "bun") return false;
  return typeof process !== "undefined" && process.stdout?.isTTY === true;
}
