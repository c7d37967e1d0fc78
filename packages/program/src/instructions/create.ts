/**
 * Create: allocate the vault record at its derived address and write a
 * fresh record naming the signer as authority.
 */

import { requireSigner, requireTransferService } from "../checks.js";
import { vaultSeeds } from "../pda.js";
import { VAULT_LAYOUT, VaultState } from "../state/vault-state.js";
import { ProgramError } from "../types.js";
import type { InstructionContext, VaultAccounts } from "./accounts.js";

export function processCreate(
  ctx: InstructionContext,
  accounts: VaultAccounts,
  bump: number,
): void {
  const { authority, vault, transferService } = accounts;
  const { runtime, programId } = ctx;

  requireSigner(runtime, authority);

  const seeds = vaultSeeds(authority.address, bump);
  if (!runtime.verifyDerivation(vault.address, seeds)) {
    throw new ProgramError(
      "DERIVATION_MISMATCH",
      `Seed ${String(bump)} does not derive vault ${vault.address.toBase58()}`,
    );
  }

  requireTransferService(runtime, transferService);

  // Fails if the address is already allocated.
  runtime.allocate(vault, VAULT_LAYOUT.LEN, programId, authority, {
    kind: "derivation",
    seeds,
  });

  VaultState.initialize(vault, authority.address);
}
