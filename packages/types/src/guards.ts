/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that cross the program boundary.
 */

import { U64_MAX } from "./numeric.js";

export function isU64(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= U64_MAX;
}
