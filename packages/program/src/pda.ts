/**
 * @strongbox/program — Vault address derivation.
 *
 * A vault lives at the program-derived address of
 * ["vault", authority, [bump]] under the program id. It has no private key;
 * the program authorizes it by presenting these seeds to the runtime.
 */

import { PublicKey } from "@solana/web3.js";
import { VAULT_SEED } from "./types.js";

/**
 * Seeds that derive the vault address for `authority` with `bump`.
 */
export function vaultSeeds(authority: PublicKey, bump: number): Uint8Array[] {
  return [VAULT_SEED, authority.toBytes(), Uint8Array.of(bump)];
}

/**
 * Canonical vault address for `authority`: the highest bump that yields an
 * address off the ed25519 curve.
 */
export function findVaultAddress(
  authority: PublicKey,
  programId: PublicKey,
): [address: PublicKey, bump: number] {
  return PublicKey.findProgramAddressSync(
    [VAULT_SEED, authority.toBytes()],
    programId,
  );
}
