/**
 * Credit: move lamports from the authority into the vault and add them to
 * the recorded balance. A zero amount is accepted.
 */

import { checkedAddU64 } from "@strongbox/types";
import { requireTransferService } from "../checks.js";
import { ProgramError } from "../types.js";
import { loadAuthorizedVault } from "./accounts.js";
import type { InstructionContext, VaultAccounts } from "./accounts.js";

export function processCredit(
  ctx: InstructionContext,
  accounts: VaultAccounts,
  amount: bigint,
): void {
  const { authority, vault, transferService } = accounts;
  const { runtime } = ctx;

  const state = loadAuthorizedVault(ctx, accounts);
  requireTransferService(runtime, transferService);

  runtime.transfer(authority, vault, amount, { kind: "signature" });

  const balance = checkedAddU64(state.balance, amount);
  if (balance === undefined) {
    throw new ProgramError(
      "OVERFLOW",
      `Credit of ${amount.toString()} overflows balance ${state.balance.toString()}`,
    );
  }
  state.setBalance(balance);
}
