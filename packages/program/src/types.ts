/**
 * @strongbox/program — Program types, constants and errors.
 *
 * Rules:
 * - The decoded instruction is a closed tagged union; dispatch is exhaustive
 * - Every failed check throws a ProgramError and aborts the request
 * - Amounts are bigint u64, seed bytes are integers 0–255
 */

// ─── Derivation ──────────────────────────────────────────────────────────

/** Domain string, the first seed of every vault address ("vault"). */
export const VAULT_SEED: Uint8Array = new TextEncoder().encode("vault");

// ─── Instructions ────────────────────────────────────────────────────────

/** Wire tags, the first byte of every instruction. */
export const InstructionTag = {
  Create: 0,
  Credit: 1,
  Debit: 2,
} as const;

export type InstructionTag = (typeof InstructionTag)[keyof typeof InstructionTag];

/** Minimum instruction length per tag, tag byte included. */
export const INSTRUCTION_MIN_LENGTH: Readonly<Record<InstructionTag, number>> = {
  [InstructionTag.Create]: 2,
  [InstructionTag.Credit]: 9,
  [InstructionTag.Debit]: 10,
} as const;

/** Create the vault record. `bump` is the derivation seed byte. */
export interface CreateInstruction {
  readonly kind: "create";
  readonly bump: number;
}

/** Move `amount` lamports from the authority into the vault. */
export interface CreditInstruction {
  readonly kind: "credit";
  readonly amount: bigint;
}

/** Move `amount` lamports from the vault back to the authority. */
export interface DebitInstruction {
  readonly kind: "debit";
  readonly amount: bigint;
  readonly bump: number;
}

export type VaultInstruction =
  | CreateInstruction
  | CreditInstruction
  | DebitInstruction;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for vault program operations. */
export type ProgramErrorCode =
  | "INVALID_INSTRUCTION_DATA"
  | "NOT_ENOUGH_ACCOUNT_KEYS"
  | "INCORRECT_PROGRAM_ID"
  | "MISSING_SIGNATURE"
  | "ILLEGAL_OWNER"
  | "INVALID_LAYOUT"
  | "AUTHORITY_MISMATCH"
  | "DERIVATION_MISMATCH"
  | "OVERFLOW"
  | "INSUFFICIENT_FUNDS";

/**
 * Structured error from the vault program.
 * Always thrown, never returned as a code.
 */
export class ProgramError extends Error {
  public readonly code: ProgramErrorCode;

  constructor(code: ProgramErrorCode, message: string) {
    super(message);
    this.name = "ProgramError";
    this.code = code;
  }
}
