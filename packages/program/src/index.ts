/**
 * @strongbox/program — Single-authority vault program.
 *
 * One vault per authority, at a program-derived address. Three
 * instructions: create (absent → initialized), credit and debit
 * (initialized → initialized). The host runtime moves the lamports; the
 * program validates every request and keeps the recorded balance.
 *
 * Design rules:
 * - Every check is a hard precondition; the first failure aborts the request
 * - The state record is read and written in place, never copied
 * - Balance arithmetic is checked u64: no overflow, no underflow
 */

// Entrypoint
export { processInstruction, vaultProgram } from "./processor.js";

// Instruction codec
export { decodeInstruction } from "./instruction.js";

// State
export { VaultState, VAULT_DISCRIMINATOR, VAULT_LAYOUT } from "./state/vault-state.js";

// Authorization
export { requireSigner, requireOwnedBy, requireTransferService } from "./checks.js";

// Addresses
export { findVaultAddress, vaultSeeds } from "./pda.js";

// Types
export type {
  VaultInstruction,
  CreateInstruction,
  CreditInstruction,
  DebitInstruction,
  ProgramErrorCode,
} from "./types.js";
export {
  ProgramError,
  InstructionTag,
  INSTRUCTION_MIN_LENGTH,
  VAULT_SEED,
} from "./types.js";
