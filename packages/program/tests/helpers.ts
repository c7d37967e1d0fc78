/**
 * Shared fixtures for vault program tests.
 *
 * Instruction bytes are assembled by hand here so the decoder is tested
 * against an independent encoding.
 */

import {
  Keypair,
  PublicKey,
  SystemProgram,
  TransactionInstruction,
} from "@solana/web3.js";
import { pino } from "pino";
import { vi } from "vitest";
import type { AccountView, ProgramRuntime } from "@strongbox/types";
import { LocalValidator, buildTransaction } from "@strongbox/runtime";
import type { TransactionReceipt } from "@strongbox/runtime";
import { findVaultAddress } from "../src/pda.js";
import { vaultProgram } from "../src/processor.js";

// ─── Keys ────────────────────────────────────────────────────────────────

export function keypair(seed: number): Keypair {
  return Keypair.fromSeed(new Uint8Array(32).fill(seed));
}

export const PROGRAM_ID: PublicKey = keypair(200).publicKey;

export const ONE_SOL = 1_000_000_000n;

/**
 * First test keypair whose canonical vault bump equals `bump`.
 */
export function authorityWithBump(bump: number): Keypair {
  for (let seed = 1; seed < 256; seed++) {
    const candidate = keypair(seed);
    const [, found] = findVaultAddress(candidate.publicKey, PROGRAM_ID);
    if (found === bump) return candidate;
  }
  throw new Error(`No test authority with canonical bump ${String(bump)}`);
}

// ─── Instruction bytes ───────────────────────────────────────────────────

export function createData(bump: number): Uint8Array {
  return Uint8Array.of(0x00, bump);
}

export function creditData(amount: bigint): Uint8Array {
  const data = new Uint8Array(9);
  data[0] = 0x01;
  new DataView(data.buffer).setBigUint64(1, amount, true);
  return data;
}

export function debitData(amount: bigint, bump: number): Uint8Array {
  const data = new Uint8Array(10);
  data[0] = 0x02;
  new DataView(data.buffer).setBigUint64(1, amount, true);
  data[9] = bump;
  return data;
}

// ─── Instructions ────────────────────────────────────────────────────────

export interface InstructionAccounts {
  readonly authority: PublicKey;
  readonly vault: PublicKey;
  readonly authoritySigns?: boolean;
  readonly transferService?: PublicKey;
}

export function vaultInstruction(
  accounts: InstructionAccounts,
  data: Uint8Array,
): TransactionInstruction {
  return new TransactionInstruction({
    programId: PROGRAM_ID,
    keys: [
      { pubkey: accounts.authority, isSigner: accounts.authoritySigns ?? true, isWritable: true },
      { pubkey: accounts.vault, isSigner: false, isWritable: true },
      {
        pubkey: accounts.transferService ?? SystemProgram.programId,
        isSigner: false,
        isWritable: false,
      },
    ],
    data: Buffer.from(data),
  });
}

// ─── Validator ───────────────────────────────────────────────────────────

export interface VaultFixture {
  readonly validator: LocalValidator;
  readonly authority: Keypair;
  readonly vault: PublicKey;
  readonly bump: number;
}

export function setupValidator(): LocalValidator {
  const validator = new LocalValidator();
  validator.addProgram(PROGRAM_ID, vaultProgram);
  return validator;
}

/**
 * Validator with a funded authority and its canonical vault address
 * (not yet created).
 */
export function setupVault(authority: Keypair = keypair(1)): VaultFixture {
  const validator = setupValidator();
  validator.airdrop(authority.publicKey, 10n * ONE_SOL);
  const [vault, bump] = findVaultAddress(authority.publicKey, PROGRAM_ID);
  return { validator, authority, vault, bump };
}

export function send(
  validator: LocalValidator,
  instruction: TransactionInstruction,
  signers: readonly [Keypair, ...Keypair[]],
): TransactionReceipt {
  const tx = buildTransaction(validator.latestBlockhash(), [instruction], signers);
  return validator.sendTransaction(tx);
}

export function create(fx: VaultFixture): TransactionReceipt {
  return send(
    fx.validator,
    vaultInstruction({ authority: fx.authority.publicKey, vault: fx.vault }, createData(fx.bump)),
    [fx.authority],
  );
}

export function credit(fx: VaultFixture, amount: bigint): TransactionReceipt {
  return send(
    fx.validator,
    vaultInstruction({ authority: fx.authority.publicKey, vault: fx.vault }, creditData(amount)),
    [fx.authority],
  );
}

export function debit(fx: VaultFixture, amount: bigint): TransactionReceipt {
  return send(
    fx.validator,
    vaultInstruction({ authority: fx.authority.publicKey, vault: fx.vault }, debitData(amount, fx.bump)),
    [fx.authority],
  );
}

// ─── Raw record access ───────────────────────────────────────────────────

export interface RawVault {
  readonly discriminator: number[];
  readonly authority: PublicKey;
  readonly balance: bigint;
  readonly owner: PublicKey;
  readonly lamports: bigint;
}

/**
 * Decode the stored vault bytes directly, bypassing VaultState.
 */
export function readVault(validator: LocalValidator, address: PublicKey): RawVault {
  const account = validator.getAccount(address);
  if (account === undefined) {
    throw new Error(`Vault not found: ${address.toBase58()}`);
  }
  const data = account.data;
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return {
    discriminator: [...data.subarray(0, 8)],
    authority: new PublicKey(data.subarray(8, 40)),
    balance: view.getBigUint64(40, true),
    owner: account.owner,
    lamports: account.lamports,
  };
}

/**
 * 48-byte vault record bytes for fixtures.
 */
export function vaultBytes(authority: PublicKey, balance: bigint): Uint8Array {
  const data = new Uint8Array(48);
  data.set([0x56, 0x61, 0x75, 0x6c, 0x74, 0x21, 0x21, 0x21], 0);
  data.set(authority.toBytes(), 8);
  new DataView(data.buffer).setBigUint64(40, balance, true);
  return data;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

// ─── Fake collaborator ───────────────────────────────────────────────────

export interface FakeAccountOptions {
  readonly data?: Uint8Array;
  readonly owner?: PublicKey;
  readonly isSigner?: boolean;
  readonly isWritable?: boolean;
  readonly lamports?: bigint;
}

/**
 * Plain account handle. `reads` counts accesses to `data`.
 */
export interface FakeAccount extends AccountView {
  readonly reads: number;
}

export function fakeAccount(address: PublicKey, options: FakeAccountOptions = {}): FakeAccount {
  const data = options.data ?? new Uint8Array(0);
  let reads = 0;
  return {
    address,
    isSigner: options.isSigner ?? false,
    isWritable: options.isWritable ?? false,
    lamports: options.lamports ?? 0n,
    owner: options.owner ?? SystemProgram.programId,
    get data(): Uint8Array {
      reads++;
      return data;
    },
    get reads(): number {
      return reads;
    },
  };
}

/**
 * Collaborator fake: signer and owner answers come from the handles,
 * derivations always verify, allocation and transfer are recorded only.
 */
export function fakeRuntime() {
  return {
    transferServiceId: SystemProgram.programId,
    logger: pino({ level: "silent" }),
    isSigner: vi.fn((account: AccountView) => account.isSigner),
    ownerOf: vi.fn((account: AccountView) => account.owner),
    deriveAddress: vi.fn((_seeds: readonly Uint8Array[]) => PublicKey.default),
    verifyDerivation: vi.fn((_address: PublicKey, _seeds: readonly Uint8Array[]) => true),
    allocate: vi.fn(),
    transfer: vi.fn(),
  } satisfies ProgramRuntime;
}
