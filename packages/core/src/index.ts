/**
 * @tweenloom/core — time-driven value interpolation.
 *
 * Zero external dependencies. Framework-agnostic.
 * Runs in browser and Node.js environments; the host supplies frame deltas.
 */

export * from "./tween/index.js";
