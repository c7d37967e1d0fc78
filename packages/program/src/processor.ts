/**
 * @strongbox/program — Entrypoint and dispatch.
 *
 * The single function the host runtime invokes. Decodes the instruction
 * once, then routes it to its handler. Performs no checks of its own and
 * returns or throws exactly what the handler does.
 */

import type { PublicKey } from "@solana/web3.js";
import type { AccountView, ProgramEntrypoint, ProgramRuntime } from "@strongbox/types";
import { decodeInstruction } from "./instruction.js";
import { parseAccounts } from "./instructions/accounts.js";
import type { InstructionContext } from "./instructions/accounts.js";
import { processCreate } from "./instructions/create.js";
import { processCredit } from "./instructions/credit.js";
import { processDebit } from "./instructions/debit.js";
import type { VaultInstruction } from "./types.js";

function logFields(instruction: VaultInstruction): Record<string, string | number> {
  switch (instruction.kind) {
    case "create":
      return { instruction: "create", bump: instruction.bump };
    case "credit":
      return { instruction: "credit", amount: instruction.amount.toString() };
    case "debit":
      return {
        instruction: "debit",
        amount: instruction.amount.toString(),
        bump: instruction.bump,
      };
  }
}

export function processInstruction(
  programId: PublicKey,
  accounts: readonly AccountView[],
  data: Uint8Array,
  runtime: ProgramRuntime,
): void {
  const instruction = decodeInstruction(data);
  runtime.logger.debug(logFields(instruction), "Vault instruction decoded");

  const ctx: InstructionContext = { programId, runtime };
  const vaultAccounts = parseAccounts(accounts);

  switch (instruction.kind) {
    case "create":
      processCreate(ctx, vaultAccounts, instruction.bump);
      return;
    case "credit":
      processCredit(ctx, vaultAccounts, instruction.amount);
      return;
    case "debit":
      processDebit(ctx, vaultAccounts, instruction.amount, instruction.bump);
      return;
    default: {
      const unreachable: never = instruction;
      throw new Error(`Unhandled instruction: ${JSON.stringify(unreachable)}`);
    }
  }
}

/** The vault program, ready to deploy on a host runtime. */
export const vaultProgram: ProgramEntrypoint = processInstruction;
