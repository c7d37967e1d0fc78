/**
 * Unsigned 64-bit quantities.
 *
 * Balances and lamport amounts are bigint in [0, 2^64 - 1]. Arithmetic that
 * leaves the range is an error at the call site, never a wraparound.
 */

export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/**
 * Checked u64 addition. Returns undefined on overflow.
 */
export function checkedAddU64(a: bigint, b: bigint): bigint | undefined {
  const sum = a + b;
  return sum > U64_MAX ? undefined : sum;
}

/**
 * Checked u64 subtraction. Returns undefined on underflow.
 */
export function checkedSubU64(a: bigint, b: bigint): bigint | undefined {
  return b > a ? undefined : a - b;
}
