/**
 * Runtime detection and Effect platform layer selection
 *
 * The library targets Node.js; the Effect platform layer provides the
 * FileSystem and Path services used by the io modules.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Supported JavaScript runtimes
 */
export type Runtime = "node" | "deno" | "bun";

/**
 * Detect the current JavaScript runtime
 *
 * Used for error context. Checks for runtime-specific globals.
 */
export const detectRuntime = (): Runtime => {
  if ("Bun" in globalThis) return "bun";
  if ("Deno" in globalThis) return "deno";
  return "node";
};

/**
 * Get the Effect platform layer providing FileSystem and Path
 *
 * Deno and Bun both run the Node layer through their Node compatibility.
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
