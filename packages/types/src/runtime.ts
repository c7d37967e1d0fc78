/**
 * Host Runtime Collaborator
 *
 * The interface a program consumes from the ledger it runs on. The program
 * calls these as black-box primitives and trusts their results; it
 * implements none of them.
 *
 * Rules:
 * - Every method is synchronous and throws on failure
 * - Failures are surfaced to the caller unchanged
 * - Derivations are scoped to the invoking program's id
 */

import type { PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";
import type { AccountView } from "./account.js";

// =============================================================================
// Authorization
// =============================================================================

/**
 * Capability presented to the runtime when debiting or allocating a region.
 *
 * - signature: the region's address signed the transaction
 * - derivation: the region's address is derived from `seeds` under the
 *   invoking program's id. The runtime re-derives it and, if it matches,
 *   treats the request as signed on the region's behalf.
 */
export type Authorization =
  | { readonly kind: "signature" }
  | { readonly kind: "derivation"; readonly seeds: readonly Uint8Array[] };

// =============================================================================
// Program Runtime
// =============================================================================

export interface ProgramRuntime {
  /** Address of the value-transfer service (the system program). */
  readonly transferServiceId: PublicKey;

  /** Logger scoped to the current invocation. */
  readonly logger: Logger;

  /** Whether `account` carries a verified signature in this transaction. */
  isSigner(account: AccountView): boolean;

  /** Declared owner of the region behind `account`. */
  ownerOf(account: AccountView): PublicKey;

  /**
   * Derive an address from `seeds` under the invoking program's id.
   * The first seed is the domain string. Throws if the seeds produce an
   * address that has a private key.
   */
  deriveAddress(seeds: readonly Uint8Array[]): PublicKey;

  /** Whether `seeds` derive exactly `address` under the invoking program. */
  verifyDerivation(address: PublicKey, seeds: readonly Uint8Array[]): boolean;

  /**
   * Allocate `size` zeroed bytes at `target`, funded by `funder` to the
   * rent-exempt minimum, owned by `owner`. `authorization` must cover
   * `target`; `funder` must be a signer.
   */
  allocate(
    target: AccountView,
    size: number,
    owner: PublicKey,
    funder: AccountView,
    authorization: Authorization,
  ): void;

  /** Move `amount` lamports from `from` to `to`. `authorization` must cover `from`. */
  transfer(
    from: AccountView,
    to: AccountView,
    amount: bigint,
    authorization: Authorization,
  ): void;
}

// =============================================================================
// Entrypoint
// =============================================================================

/**
 * Signature of a deployed program. Runs to completion; a thrown error
 * aborts the whole transaction.
 */
export type ProgramEntrypoint = (
  programId: PublicKey,
  accounts: readonly AccountView[],
  data: Uint8Array,
  runtime: ProgramRuntime,
) => void;
