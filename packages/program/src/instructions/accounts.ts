/**
 * @strongbox/program — Account list handling shared by all handlers.
 *
 * Every instruction takes the same three accounts, in order:
 *
 *   0. [signer, writable] authority
 *   1. [writable]         vault
 *   2. []                 transfer service (system program)
 */

import type { PublicKey } from "@solana/web3.js";
import type { AccountView, ProgramRuntime } from "@strongbox/types";
import { requireOwnedBy, requireSigner } from "../checks.js";
import { VaultState } from "../state/vault-state.js";
import { ProgramError } from "../types.js";

export interface InstructionContext {
  readonly programId: PublicKey;
  readonly runtime: ProgramRuntime;
}

export interface VaultAccounts {
  readonly authority: AccountView;
  readonly vault: AccountView;
  readonly transferService: AccountView;
}

/**
 * Split the account list into its named roles.
 *
 * @throws {ProgramError} NOT_ENOUGH_ACCOUNT_KEYS if fewer than three accounts
 */
export function parseAccounts(accounts: readonly AccountView[]): VaultAccounts {
  const [authority, vault, transferService] = accounts;
  if (authority === undefined || vault === undefined || transferService === undefined) {
    throw new ProgramError(
      "NOT_ENOUGH_ACCOUNT_KEYS",
      `Expected 3 accounts, got ${String(accounts.length)}`,
    );
  }
  return { authority, vault, transferService };
}

/**
 * Checks shared by credit and debit, in order: authority signed, vault
 * owned by this program, vault layout valid, stored authority matches.
 */
export function loadAuthorizedVault(
  ctx: InstructionContext,
  { authority, vault }: VaultAccounts,
): VaultState {
  requireSigner(ctx.runtime, authority);
  requireOwnedBy(ctx.runtime, vault, ctx.programId);

  const state = VaultState.read(vault);
  if (!state.isAuthority(authority.address)) {
    throw new ProgramError(
      "AUTHORITY_MISMATCH",
      `Vault authority ${state.authority.toBase58()} does not match ${authority.address.toBase58()}`,
    );
  }
  return state;
}
