/**
 * Debit: move lamports from the vault back to its authority, signing for
 * the vault with its derivation seeds, and subtract them from the
 * recorded balance.
 */

import { checkedSubU64 } from "@strongbox/types";
import { requireTransferService } from "../checks.js";
import { vaultSeeds } from "../pda.js";
import { ProgramError } from "../types.js";
import { loadAuthorizedVault } from "./accounts.js";
import type { InstructionContext, VaultAccounts } from "./accounts.js";

export function processDebit(
  ctx: InstructionContext,
  accounts: VaultAccounts,
  amount: bigint,
  bump: number,
): void {
  const { authority, vault, transferService } = accounts;
  const { runtime } = ctx;

  const state = loadAuthorizedVault(ctx, accounts);

  const balance = checkedSubU64(state.balance, amount);
  if (balance === undefined) {
    throw new ProgramError(
      "INSUFFICIENT_FUNDS",
      `Debit of ${amount.toString()} exceeds balance ${state.balance.toString()}`,
    );
  }

  const seeds = vaultSeeds(authority.address, bump);
  if (!runtime.verifyDerivation(vault.address, seeds)) {
    throw new ProgramError(
      "DERIVATION_MISMATCH",
      `Seed ${String(bump)} does not derive vault ${vault.address.toBase58()}`,
    );
  }

  requireTransferService(runtime, transferService);

  runtime.transfer(vault, authority, amount, { kind: "derivation", seeds });

  state.setBalance(balance);
}
