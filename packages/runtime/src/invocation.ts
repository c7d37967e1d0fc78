/**
 * @strongbox/runtime — Program invocation context.
 *
 * Implements the collaborator contract a program consumes while one
 * instruction executes: account handles over the live store, signer and
 * owner queries, derived-address derivation, allocation and transfers.
 *
 * Rules:
 * - Only accounts listed in the instruction can be touched
 * - Debiting or allocating requires a signature or a matching derivation
 *   under the invoking program's id
 * - Checks run before any mutation; a failing call leaves the store as it was
 */

import { PublicKey, SystemProgram } from "@solana/web3.js";
import type { Logger } from "pino";
import { checkedAddU64, isU64 } from "@strongbox/types";
import type { AccountView, Authorization, ProgramRuntime } from "@strongbox/types";
import type { AccountStore } from "./account-store.js";
import { minimumBalance } from "./rent.js";
import type { RentConfig } from "./types.js";
import { RuntimeError } from "./types.js";

const EMPTY_DATA = new Uint8Array(0);

// =============================================================================
// Account Handle
// =============================================================================

/**
 * Account handle backed by the live store. Every read goes to the store,
 * so a region allocated mid-instruction is visible through the same handle.
 */
export class InvocationAccount implements AccountView {
  readonly address: PublicKey;
  readonly isSigner: boolean;
  readonly isWritable: boolean;
  private readonly store: AccountStore;

  constructor(
    store: AccountStore,
    address: PublicKey,
    isSigner: boolean,
    isWritable: boolean,
  ) {
    this.store = store;
    this.address = address;
    this.isSigner = isSigner;
    this.isWritable = isWritable;
  }

  get lamports(): bigint {
    return this.store.get(this.address)?.lamports ?? 0n;
  }

  get owner(): PublicKey {
    return this.store.get(this.address)?.owner ?? SystemProgram.programId;
  }

  get data(): Uint8Array {
    return this.store.get(this.address)?.data ?? EMPTY_DATA;
  }
}

// =============================================================================
// Invocation Runtime
// =============================================================================

export class InvocationRuntime implements ProgramRuntime {
  readonly transferServiceId: PublicKey = SystemProgram.programId;
  readonly logger: Logger;
  private readonly store: AccountStore;
  private readonly programId: PublicKey;
  private readonly accounts: ReadonlyMap<string, InvocationAccount>;
  private readonly rent: RentConfig;

  constructor(
    store: AccountStore,
    programId: PublicKey,
    accounts: readonly InvocationAccount[],
    rent: RentConfig,
    logger: Logger,
  ) {
    this.store = store;
    this.programId = programId;
    this.accounts = new Map(accounts.map((a) => [a.address.toBase58(), a]));
    this.rent = rent;
    this.logger = logger;
  }

  isSigner(account: AccountView): boolean {
    return this.resolve(account).isSigner;
  }

  ownerOf(account: AccountView): PublicKey {
    return this.resolve(account).owner;
  }

  deriveAddress(seeds: readonly Uint8Array[]): PublicKey {
    try {
      return PublicKey.createProgramAddressSync([...seeds], this.programId);
    } catch (error) {
      throw new RuntimeError(
        "INVALID_SEEDS",
        `Seeds do not derive a program address: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  verifyDerivation(address: PublicKey, seeds: readonly Uint8Array[]): boolean {
    try {
      return this.deriveAddress(seeds).equals(address);
    } catch (error) {
      if (error instanceof RuntimeError && error.code === "INVALID_SEEDS") {
        return false;
      }
      throw error;
    }
  }

  allocate(
    target: AccountView,
    size: number,
    owner: PublicKey,
    funder: AccountView,
    authorization: Authorization,
  ): void {
    const region = this.resolve(target);
    const payer = this.resolve(funder);

    this.authorize(region, authorization);
    this.authorize(payer, { kind: "signature" });
    this.requireWritable(region);
    this.requireWritable(payer);

    // A pre-funded empty system account is still free: top it up, keep its lamports.
    const existing = this.store.get(region.address);
    if (
      existing !== undefined &&
      (existing.data.length > 0 || !existing.owner.equals(SystemProgram.programId))
    ) {
      throw new RuntimeError(
        "ACCOUNT_ALREADY_IN_USE",
        `Account already in use: ${region.address.toBase58()}`,
      );
    }

    const required = minimumBalance(size, this.rent);
    const held = existing?.lamports ?? 0n;
    const charge = held >= required ? 0n : required - held;
    const payerRecord = this.store.get(payer.address);
    const available = payerRecord?.lamports ?? 0n;
    if (available < charge) {
      throw new RuntimeError(
        "INSUFFICIENT_LAMPORTS",
        `Funder ${payer.address.toBase58()} has ${available.toString()} lamports, needs ${charge.toString()}`,
      );
    }

    if (payerRecord !== undefined) {
      payerRecord.lamports = available - charge;
    }
    this.store.set(region.address, {
      lamports: held + charge,
      data: new Uint8Array(size),
      owner,
      executable: false,
    });
  }

  transfer(
    from: AccountView,
    to: AccountView,
    amount: bigint,
    authorization: Authorization,
  ): void {
    const source = this.resolve(from);
    const destination = this.resolve(to);

    if (!isU64(amount)) {
      throw new RuntimeError("INVALID_AMOUNT", `Transfer amount out of range: ${String(amount)}`);
    }
    this.authorize(source, authorization);
    this.requireWritable(source);
    this.requireWritable(destination);

    const sourceRecord = this.store.get(source.address);
    const available = sourceRecord?.lamports ?? 0n;
    if (available < amount) {
      throw new RuntimeError(
        "INSUFFICIENT_LAMPORTS",
        `Account ${source.address.toBase58()} has ${available.toString()} lamports, cannot transfer ${amount.toString()}`,
      );
    }

    if (sourceRecord === undefined || amount === 0n || source.address.equals(destination.address)) {
      return;
    }

    const destinationRecord = this.store.getOrCreate(destination.address);
    const credited = checkedAddU64(destinationRecord.lamports, amount);
    if (credited === undefined) {
      throw new RuntimeError(
        "LAMPORT_OVERFLOW",
        `Transfer would overflow ${destination.address.toBase58()}`,
      );
    }

    sourceRecord.lamports = available - amount;
    destinationRecord.lamports = credited;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private resolve(account: AccountView): InvocationAccount {
    const known = this.accounts.get(account.address.toBase58());
    if (known === undefined) {
      throw new RuntimeError(
        "MISSING_ACCOUNT",
        `Account ${account.address.toBase58()} is not part of this instruction`,
      );
    }
    return known;
  }

  private authorize(account: InvocationAccount, authorization: Authorization): void {
    if (authorization.kind === "signature") {
      if (!account.isSigner) {
        throw new RuntimeError(
          "PRIVILEGE_ESCALATION",
          `Missing required signature for ${account.address.toBase58()}`,
        );
      }
      return;
    }

    if (!this.verifyDerivation(account.address, authorization.seeds)) {
      throw new RuntimeError(
        "PRIVILEGE_ESCALATION",
        `Derivation seeds do not authorize ${account.address.toBase58()}`,
      );
    }
  }

  private requireWritable(account: InvocationAccount): void {
    if (!account.isWritable) {
      throw new RuntimeError(
        "ACCOUNT_NOT_WRITABLE",
        `Account ${account.address.toBase58()} is read-only in this transaction`,
      );
    }
  }
}
