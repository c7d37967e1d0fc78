/**
 * Storage Handles
 *
 * An account is a region of persisted storage the host runtime hands to a
 * program for the duration of one instruction. The program never owns the
 * handle; it reads and writes through it.
 *
 * Rules:
 * - `data` is the live storage buffer, not a copy. Writes land in storage.
 * - Privileges (`isSigner`, `isWritable`) are fixed for the whole transaction
 * - An address that has never been allocated reads as an empty,
 *   zero-lamport region owned by the system program
 */

import type { PublicKey } from "@solana/web3.js";

// =============================================================================
// Account View
// =============================================================================

/**
 * Opaque handle to one storage region, as seen by an executing program.
 */
export interface AccountView {
  /** 32-byte address of the region */
  readonly address: PublicKey;

  /** Whether the transaction carries a verified signature for this address */
  readonly isSigner: boolean;

  /** Whether the transaction grants write access to this region */
  readonly isWritable: boolean;

  /** Value held by the region, in lamports */
  readonly lamports: bigint;

  /** Program that owns the region and may mutate its data */
  readonly owner: PublicKey;

  /** Live region bytes. Length is fixed at allocation. */
  readonly data: Uint8Array;
}
