/**
 * @strongbox/runtime — Types for the local host runtime.
 *
 * Rules:
 * - Stored accounts are only mutated inside a transaction
 * - Every failure is a thrown RuntimeError (or the program's own error),
 *   never a silent partial result
 */

import type { PublicKey } from "@solana/web3.js";
import type { Logger } from "pino";

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * A stored account. Mutable inside the store; callers outside the
 * runtime only ever see copies.
 */
export interface AccountRecord {
  lamports: bigint;
  data: Uint8Array;
  owner: PublicKey;
  executable: boolean;
}

/** Read-only copy of an account handed out by the validator. */
export type StoredAccount = Readonly<AccountRecord>;

// ─── Rent ────────────────────────────────────────────────────────────────

/**
 * Parameters of the rent-exempt minimum balance.
 *
 * minimum = (ACCOUNT_STORAGE_OVERHEAD + dataLength)
 *           × lamportsPerByteYear × exemptionThreshold
 */
export interface RentConfig {
  readonly lamportsPerByteYear: bigint;
  readonly exemptionThreshold: bigint;
}

// ─── Validator ───────────────────────────────────────────────────────────

export interface LocalValidatorOptions {
  readonly rent?: RentConfig | undefined;
  readonly logger?: Logger | undefined;
  /** How many of the latest blockhashes stay valid. Defaults to 150. */
  readonly recentBlockhashes?: number | undefined;
}

/**
 * Result of a committed transaction.
 */
export interface TransactionReceipt {
  /** Hex-encoded fee-payer signature */
  readonly signature: string;
  /** Blockhash the transaction was built against */
  readonly blockhash: string;
  /** Base58 addresses whose lamports, data or owner changed, sorted */
  readonly changedAccounts: readonly string[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for host runtime failures. */
export type RuntimeErrorCode =
  | "INVALID_TRANSACTION"
  | "SIGNATURE_VERIFICATION_FAILED"
  | "BLOCKHASH_NOT_FOUND"
  | "ALREADY_PROCESSED"
  | "UNKNOWN_PROGRAM"
  | "MISSING_ACCOUNT"
  | "PRIVILEGE_ESCALATION"
  | "ACCOUNT_NOT_WRITABLE"
  | "ACCOUNT_ALREADY_IN_USE"
  | "INSUFFICIENT_LAMPORTS"
  | "LAMPORT_OVERFLOW"
  | "INVALID_AMOUNT"
  | "INVALID_SEEDS"
  | "READONLY_ACCOUNT_MODIFIED"
  | "EXTERNAL_ACCOUNT_DATA_MODIFIED"
  | "UNBALANCED_INSTRUCTION";

/**
 * Structured error from the host runtime.
 * Always thrown, never returned as a code.
 */
export class RuntimeError extends Error {
  public readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string) {
    super(message);
    this.name = "RuntimeError";
    this.code = code;
  }
}
