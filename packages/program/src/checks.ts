/**
 * @strongbox/program — Authorization checks.
 *
 * Predicates every handler runs before touching record bytes. Each throws
 * on failure and has no side effects.
 */

import type { PublicKey } from "@solana/web3.js";
import type { AccountView, ProgramRuntime } from "@strongbox/types";
import { ProgramError } from "./types.js";

/**
 * Require that `account` signed the request.
 */
export function requireSigner(runtime: ProgramRuntime, account: AccountView): void {
  if (!runtime.isSigner(account)) {
    throw new ProgramError(
      "MISSING_SIGNATURE",
      `Missing required signature: ${account.address.toBase58()}`,
    );
  }
}

/**
 * Require that `account` is owned by `owner`. For the program's own id this
 * proves the bytes were written by this program.
 */
export function requireOwnedBy(
  runtime: ProgramRuntime,
  account: AccountView,
  owner: PublicKey,
): void {
  if (!runtime.ownerOf(account).equals(owner)) {
    throw new ProgramError(
      "ILLEGAL_OWNER",
      `Account ${account.address.toBase58()} is not owned by ${owner.toBase58()}`,
    );
  }
}

/**
 * Require that `account` is the runtime's value-transfer service.
 */
export function requireTransferService(
  runtime: ProgramRuntime,
  account: AccountView,
): void {
  if (!account.address.equals(runtime.transferServiceId)) {
    throw new ProgramError(
      "INCORRECT_PROGRAM_ID",
      `Expected transfer service ${runtime.transferServiceId.toBase58()}, got ${account.address.toBase58()}`,
    );
  }
}
