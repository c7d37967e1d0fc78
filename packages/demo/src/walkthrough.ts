/**
 * @strongbox/demo — Vault lifecycle walkthrough.
 *
 * Boots a local validator, deploys the vault program and drives one vault
 * through create → credit → debit → rejected overdraft. Yields a step at a
 * time so the caller decides how (and how fast) to render it.
 */

import { Keypair, PublicKey, SystemProgram, TransactionInstruction } from "@solana/web3.js";
import type { Logger } from "pino";
import {
  InstructionTag,
  ProgramError,
  VaultState,
  findVaultAddress,
  vaultProgram,
} from "@strongbox/program";
import type { ProgramErrorCode } from "@strongbox/program";
import { LocalValidator, buildTransaction } from "@strongbox/runtime";
import type { TransactionReceipt } from "@strongbox/runtime";
import type { DemoConfig } from "./config.js";

export const LAMPORTS_PER_SOL = 1_000_000_000n;
export const CREDIT_AMOUNT = 3n * LAMPORTS_PER_SOL;
export const DEBIT_AMOUNT = 1n * LAMPORTS_PER_SOL;

// =============================================================================
// Types
// =============================================================================

export interface WalkthroughStep {
  readonly title: string;
  readonly facts: readonly (readonly [label: string, value: string])[];
}

export interface WalkthroughResult {
  readonly vault: PublicKey;
  readonly bump: number;
  readonly recordedBalance: bigint;
  readonly vaultLamports: bigint;
  readonly authorityLamports: bigint;
  readonly rejection: ProgramErrorCode;
}

export interface WalkthroughOptions {
  readonly config: DemoConfig;
  readonly logger: Logger;
  readonly authority?: Keypair | undefined;
}

// =============================================================================
// Instruction bytes
// =============================================================================

function encode(tag: InstructionTag, amount?: bigint, bump?: number): Buffer {
  const data = Buffer.alloc(1 + (amount === undefined ? 0 : 8) + (bump === undefined ? 0 : 1));
  data.writeUInt8(tag, 0);
  let offset = 1;
  if (amount !== undefined) {
    data.writeBigUInt64LE(amount, offset);
    offset += 8;
  }
  if (bump !== undefined) {
    data.writeUInt8(bump, offset);
  }
  return data;
}

function vaultInstruction(
  programId: PublicKey,
  authority: PublicKey,
  vault: PublicKey,
  data: Buffer,
): TransactionInstruction {
  return new TransactionInstruction({
    programId,
    keys: [
      { pubkey: authority, isSigner: true, isWritable: true },
      { pubkey: vault, isSigner: false, isWritable: true },
      { pubkey: SystemProgram.programId, isSigner: false, isWritable: false },
    ],
    data,
  });
}

export function formatSol(lamports: bigint): string {
  const whole = lamports / LAMPORTS_PER_SOL;
  const fraction = (lamports % LAMPORTS_PER_SOL).toString().padStart(9, "0").replace(/0+$/, "");
  return fraction === "" ? `${whole.toString()} SOL` : `${whole.toString()}.${fraction} SOL`;
}

// =============================================================================
// Walkthrough
// =============================================================================

export function* walkthrough(
  options: WalkthroughOptions,
): Generator<WalkthroughStep, WalkthroughResult, void> {
  const { config, logger } = options;
  const authority = options.authority ?? Keypair.generate();
  const programId = config.VAULT_PROGRAM_ID;

  // ─── Boot ───────────────────────────────────────────────────────────

  const validator = new LocalValidator({
    rent: {
      lamportsPerByteYear: config.RENT_LAMPORTS_PER_BYTE_YEAR,
      exemptionThreshold: config.RENT_EXEMPTION_THRESHOLD,
    },
    logger,
  });
  validator.addProgram(programId, vaultProgram);
  validator.airdrop(authority.publicKey, config.DEMO_AIRDROP_LAMPORTS);

  yield {
    title: "Boot local validator",
    facts: [
      ["program", programId.toBase58()],
      ["authority", authority.publicKey.toBase58()],
      ["airdrop", formatSol(config.DEMO_AIRDROP_LAMPORTS)],
    ],
  };

  const [vault, bump] = findVaultAddress(authority.publicKey, programId);
  const send = (data: Buffer): TransactionReceipt =>
    validator.sendTransaction(
      buildTransaction(
        validator.latestBlockhash(),
        [vaultInstruction(programId, authority.publicKey, vault, data)],
        [authority],
      ),
    );

  const recordedBalance = (): bigint => {
    const stored = validator.getAccount(vault);
    if (stored === undefined) {
      throw new Error(`Vault ${vault.toBase58()} does not exist`);
    }
    return VaultState.read({ address: vault, isSigner: false, isWritable: false, ...stored }).balance;
  };

  // ─── Create ─────────────────────────────────────────────────────────

  const created = send(encode(InstructionTag.Create, undefined, bump));
  yield {
    title: "Create vault",
    facts: [
      ["vault", vault.toBase58()],
      ["bump", String(bump)],
      ["rent deposit", formatSol(validator.getBalance(vault))],
      ["signature", created.signature.slice(0, 16)],
    ],
  };

  // ─── Credit ─────────────────────────────────────────────────────────

  send(encode(InstructionTag.Credit, CREDIT_AMOUNT));
  yield {
    title: "Credit",
    facts: [
      ["amount", formatSol(CREDIT_AMOUNT)],
      ["recorded", formatSol(recordedBalance())],
      ["vault lamports", formatSol(validator.getBalance(vault))],
    ],
  };

  // ─── Debit ──────────────────────────────────────────────────────────

  send(encode(InstructionTag.Debit, DEBIT_AMOUNT, bump));
  yield {
    title: "Debit",
    facts: [
      ["amount", formatSol(DEBIT_AMOUNT)],
      ["recorded", formatSol(recordedBalance())],
      ["authority", formatSol(validator.getBalance(authority.publicKey))],
    ],
  };

  // ─── Overdraft ──────────────────────────────────────────────────────

  const overdraft = recordedBalance() + 1n;
  let rejection: ProgramErrorCode | undefined;
  try {
    send(encode(InstructionTag.Debit, overdraft, bump));
  } catch (error) {
    if (!(error instanceof ProgramError)) throw error;
    rejection = error.code;
  }
  if (rejection === undefined) {
    throw new Error("Overdraft was accepted");
  }
  yield {
    title: "Rejected overdraft",
    facts: [
      ["amount", formatSol(overdraft)],
      ["error", rejection],
      ["recorded", formatSol(recordedBalance())],
    ],
  };

  return {
    vault,
    bump,
    recordedBalance: recordedBalance(),
    vaultLamports: validator.getBalance(vault),
    authorityLamports: validator.getBalance(authority.publicKey),
    rejection,
  };
}
