/**
 * @strongbox/runtime — Local validator.
 *
 * An in-process host ledger. Holds accounts, verifies transaction
 * signatures, executes registered programs, and commits each transaction
 * all-or-nothing.
 *
 * API surface:
 * - addProgram() — Register an executable program at an address
 * - airdrop() — Mint lamports into an address
 * - sendTransaction() — Verify, execute and commit a signed transaction
 * - getAccount() / getBalance() — Read committed state (copies)
 * - setAccount() — Install a fixture account
 * - latestBlockhash() — Blockhash to build the next transaction against
 *
 * Execution model: one transaction at a time, instructions in order, each
 * run to completion. A transaction must reference one of the most recent
 * blockhashes the validator issued. A thrown error restores the store to
 * its state before the transaction and is rethrown unchanged.
 */

import { createHash } from "node:crypto";
import {
  BPF_LOADER_PROGRAM_ID,
  PublicKey,
  SystemProgram,
  type Transaction,
  type TransactionInstruction,
} from "@solana/web3.js";
import { pino } from "pino";
import type { Logger } from "pino";
import { checkedAddU64, isU64 } from "@strongbox/types";
import type { ProgramEntrypoint } from "@strongbox/types";
import {
  AccountStore,
  bytesEqual,
  cloneRecord,
  emptyRecord,
  recordsEqual,
} from "./account-store.js";
import { InvocationAccount, InvocationRuntime } from "./invocation.js";
import { DEFAULT_RENT, minimumBalance } from "./rent.js";
import type {
  AccountRecord,
  LocalValidatorOptions,
  RentConfig,
  StoredAccount,
  TransactionReceipt,
} from "./types.js";
import { RuntimeError } from "./types.js";

export const NATIVE_LOADER_ID = new PublicKey(
  "NativeLoader1111111111111111111111111111111",
);

/** Blockhashes a transaction may reference: the latest and the ones before it. */
export const DEFAULT_RECENT_BLOCKHASHES = 150;

function deriveBlockhash(sequence: number): string {
  const digest = createHash("sha256")
    .update(`strongbox:blockhash:${String(sequence)}`)
    .digest();
  return new PublicKey(digest).toBase58();
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

interface PreInstructionState {
  readonly account: InvocationAccount;
  readonly record: AccountRecord;
}

export class LocalValidator {
  private readonly _store = new AccountStore();
  private readonly _programs = new Map<string, ProgramEntrypoint>();
  /** Recent blockhashes, oldest first, each with the signatures committed against it. */
  private readonly _recent = new Map<string, Set<string>>();
  private readonly _recentLimit: number;
  private readonly _rent: RentConfig;
  private readonly _logger: Logger;
  private _blockhashSequence = 0;
  private _blockhash: string;

  constructor(options: LocalValidatorOptions = {}) {
    this._rent = options.rent ?? DEFAULT_RENT;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._recentLimit = options.recentBlockhashes ?? DEFAULT_RECENT_BLOCKHASHES;
    if (!Number.isInteger(this._recentLimit) || this._recentLimit < 1) {
      throw new RangeError(`Invalid recent blockhash count: ${String(this._recentLimit)}`);
    }
    this._blockhash = deriveBlockhash(this._blockhashSequence);
    this._recent.set(this._blockhash, new Set());

    this._store.set(SystemProgram.programId, {
      lamports: 1n,
      data: new Uint8Array(0),
      owner: NATIVE_LOADER_ID,
      executable: true,
    });
  }

  // ─── Setup ───────────────────────────────────────────────────────────

  /**
   * Register `entrypoint` as the executable program at `programId`.
   */
  addProgram(programId: PublicKey, entrypoint: ProgramEntrypoint): void {
    this._programs.set(programId.toBase58(), entrypoint);
    this._store.set(programId, {
      lamports: minimumBalance(0, this._rent),
      data: new Uint8Array(0),
      owner: BPF_LOADER_PROGRAM_ID,
      executable: true,
    });
    this._logger.debug({ programId: programId.toBase58() }, "Program deployed");
  }

  /**
   * Credit `lamports` to `address` outside of any transaction.
   */
  airdrop(address: PublicKey, lamports: bigint): void {
    if (!isU64(lamports)) {
      throw new RuntimeError("INVALID_AMOUNT", `Airdrop amount out of range: ${String(lamports)}`);
    }
    const record = this._store.getOrCreate(address);
    const credited = checkedAddU64(record.lamports, lamports);
    if (credited === undefined) {
      throw new RuntimeError("LAMPORT_OVERFLOW", `Airdrop would overflow ${address.toBase58()}`);
    }
    record.lamports = credited;
  }

  /**
   * Install an account as-is. Intended for test fixtures.
   */
  setAccount(address: PublicKey, account: StoredAccount): void {
    this._store.set(address, cloneRecord(account));
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Copy of the committed account at `address`, or undefined.
   */
  getAccount(address: PublicKey): StoredAccount | undefined {
    const record = this._store.get(address);
    return record === undefined ? undefined : cloneRecord(record);
  }

  getBalance(address: PublicKey): bigint {
    return this._store.get(address)?.lamports ?? 0n;
  }

  minimumBalance(dataLength: number): bigint {
    return minimumBalance(dataLength, this._rent);
  }

  latestBlockhash(): string {
    return this._blockhash;
  }

  // ─── Execution ───────────────────────────────────────────────────────

  /**
   * Verify, execute and commit a signed transaction.
   *
   * @throws {RuntimeError} for malformed, unsigned or replayed transactions
   * and for privilege violations
   * @throws the executing program's own error, unchanged
   */
  sendTransaction(tx: Transaction): TransactionReceipt {
    const feePayer = tx.feePayer;
    const blockhash = tx.recentBlockhash;
    if (feePayer === undefined || blockhash === undefined) {
      throw new RuntimeError(
        "INVALID_TRANSACTION",
        "Transaction requires a fee payer and a recent blockhash",
      );
    }
    if (tx.instructions.length === 0) {
      throw new RuntimeError("INVALID_TRANSACTION", "Transaction has no instructions");
    }
    const processed = this._recent.get(blockhash);
    if (processed === undefined) {
      throw new RuntimeError(
        "BLOCKHASH_NOT_FOUND",
        `Blockhash not issued by this validator or expired: ${blockhash}`,
      );
    }
    if (!tx.verifySignatures()) {
      throw new RuntimeError(
        "SIGNATURE_VERIFICATION_FAILED",
        "Transaction is missing a required signature or a signature is invalid",
      );
    }

    const first = tx.signatures[0]?.signature;
    const signature = first === undefined || first === null ? "" : first.toString("hex");
    if (processed.has(signature)) {
      throw new RuntimeError("ALREADY_PROCESSED", `Transaction already processed: ${signature}`);
    }

    const signers = new Set(
      tx.signatures
        .filter((pair) => pair.signature !== null)
        .map((pair) => pair.publicKey.toBase58()),
    );
    const writable = new Set<string>([feePayer.toBase58()]);
    for (const ix of tx.instructions) {
      for (const meta of ix.keys) {
        if (meta.isWritable) writable.add(meta.pubkey.toBase58());
      }
    }

    const log = this._logger.child({ signature: signature.slice(0, 16) });
    const before = this._store.snapshot();

    try {
      tx.instructions.forEach((ix, index) => {
        this.execute(ix, index, signers, writable, log);
      });
    } catch (error) {
      this._store.restore(before);
      log.warn(
        {
          code: errorCode(error),
          reason: error instanceof Error ? error.message : String(error),
        },
        "Transaction failed",
      );
      throw error;
    }

    processed.add(signature);
    this.advanceBlockhash();

    const changedAccounts = this._store.changedSince(before);
    log.debug({ changed: changedAccounts.length }, "Transaction committed");

    return { signature, blockhash, changedAccounts };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Issue the next blockhash. The oldest one falls out of the window, and
   * with it the signatures that could only be replayed against it.
   */
  private advanceBlockhash(): void {
    this._blockhashSequence++;
    this._blockhash = deriveBlockhash(this._blockhashSequence);
    this._recent.set(this._blockhash, new Set());
    for (const oldest of this._recent.keys()) {
      if (this._recent.size <= this._recentLimit) break;
      this._recent.delete(oldest);
    }
  }

  private execute(
    ix: TransactionInstruction,
    index: number,
    signers: ReadonlySet<string>,
    writable: ReadonlySet<string>,
    log: Logger,
  ): void {
    const programKey = ix.programId.toBase58();
    const entrypoint = this._programs.get(programKey);
    if (entrypoint === undefined) {
      throw new RuntimeError("UNKNOWN_PROGRAM", `No program deployed at ${programKey}`);
    }

    const accounts = ix.keys.map((meta) => {
      const key = meta.pubkey.toBase58();
      return new InvocationAccount(this._store, meta.pubkey, signers.has(key), writable.has(key));
    });

    const before = new Map<string, PreInstructionState>();
    for (const account of accounts) {
      const record = this._store.get(account.address) ?? emptyRecord();
      before.set(account.address.toBase58(), { account, record: cloneRecord(record) });
    }

    const runtime = new InvocationRuntime(
      this._store,
      ix.programId,
      accounts,
      this._rent,
      log.child({ program: programKey, instruction: index }),
    );

    entrypoint(ix.programId, accounts, Uint8Array.from(ix.data), runtime);

    this.verifyEffects(ix.programId, before);
  }

  /**
   * Privilege checks applied after a program returns.
   */
  private verifyEffects(
    programId: PublicKey,
    before: ReadonlyMap<string, PreInstructionState>,
  ): void {
    let lamportsBefore = 0n;
    let lamportsAfter = 0n;

    for (const [key, { account, record: pre }] of before) {
      const post = this._store.get(account.address) ?? emptyRecord();
      lamportsBefore += pre.lamports;
      lamportsAfter += post.lamports;

      if (!account.isWritable && !recordsEqual(pre, post)) {
        throw new RuntimeError(
          "READONLY_ACCOUNT_MODIFIED",
          `Instruction modified read-only account ${key}`,
        );
      }

      if (!bytesEqual(pre.data, post.data)) {
        const mayWrite =
          post.owner.equals(programId) &&
          (pre.owner.equals(programId) || pre.data.length === 0);
        if (!mayWrite) {
          throw new RuntimeError(
            "EXTERNAL_ACCOUNT_DATA_MODIFIED",
            `Program ${programId.toBase58()} modified data of account ${key} it does not own`,
          );
        }
      }
    }

    if (lamportsBefore !== lamportsAfter) {
      throw new RuntimeError(
        "UNBALANCED_INSTRUCTION",
        `Instruction changed total lamports from ${lamportsBefore.toString()} to ${lamportsAfter.toString()}`,
      );
    }
  }
}
