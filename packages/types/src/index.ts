/**
 * @strongbox/types — Shared types for the strongbox stack.
 *
 * These types are used across all strongbox packages:
 * - Storage handles (accounts) as seen by an executing program
 * - The host runtime collaborator contract
 * - Unsigned 64-bit bounds and checked arithmetic
 *
 * Design rules:
 * - All types are immutable (readonly) except the live account data buffer
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Account types
export type { AccountView } from "./account.js";

// Runtime collaborator types
export type {
  Authorization,
  ProgramRuntime,
  ProgramEntrypoint,
} from "./runtime.js";

// Numeric bounds
export {
  U64_MAX,
  checkedAddU64,
  checkedSubU64,
} from "./numeric.js";

// Runtime type guards
export { isU64 } from "./guards.js";
