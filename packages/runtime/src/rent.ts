/**
 * Rent-exempt minimum balance.
 *
 * An allocated region must hold at least this many lamports to persist
 * indefinitely. Allocation funds the region with exactly this amount.
 */

import type { RentConfig } from "./types.js";

/** Bytes of bookkeeping charged on top of every account's data. */
export const ACCOUNT_STORAGE_OVERHEAD = 128;

export const DEFAULT_RENT: RentConfig = {
  lamportsPerByteYear: 3480n,
  exemptionThreshold: 2n,
};

/**
 * Minimum lamports an account of `dataLength` bytes must hold.
 *
 * 0 bytes → 890880n, 48 bytes → 1224960n with the default rent.
 */
export function minimumBalance(
  dataLength: number,
  rent: RentConfig = DEFAULT_RENT,
): bigint {
  if (!Number.isInteger(dataLength) || dataLength < 0) {
    throw new RangeError(`Invalid account data length: ${String(dataLength)}`);
  }
  return (
    BigInt(ACCOUNT_STORAGE_OVERHEAD + dataLength) *
    rent.lamportsPerByteYear *
    rent.exemptionThreshold
  );
}
