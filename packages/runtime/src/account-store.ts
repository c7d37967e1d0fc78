/**
 * @strongbox/runtime — Account store.
 *
 * Address-keyed map of stored accounts. Supports whole-store snapshots so
 * the validator can roll back a failed transaction.
 *
 * Rules:
 * - Keys are base58 addresses
 * - Snapshots are deep copies; restoring never aliases live buffers
 * - An absent account is indistinguishable from an empty, zero-lamport,
 *   system-owned one
 */

import { PublicKey, SystemProgram } from "@solana/web3.js";
import type { AccountRecord } from "./types.js";

/** Opaque deep copy of the store's contents. */
export type AccountStoreSnapshot = ReadonlyMap<string, Readonly<AccountRecord>>;

const EMPTY_DATA = new Uint8Array(0);

/**
 * Copy an account record, including its data bytes.
 */
export function cloneRecord(record: Readonly<AccountRecord>): AccountRecord {
  return {
    lamports: record.lamports,
    data: Uint8Array.from(record.data),
    owner: new PublicKey(record.owner.toBytes()),
    executable: record.executable,
  };
}

/**
 * The record an absent address reads as.
 */
export function emptyRecord(): AccountRecord {
  return {
    lamports: 0n,
    data: EMPTY_DATA,
    owner: SystemProgram.programId,
    executable: false,
  };
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Whether two records hold the same lamports, data, owner and flags.
 */
export function recordsEqual(
  a: Readonly<AccountRecord>,
  b: Readonly<AccountRecord>,
): boolean {
  return (
    a.lamports === b.lamports &&
    a.executable === b.executable &&
    a.owner.equals(b.owner) &&
    bytesEqual(a.data, b.data)
  );
}

export class AccountStore {
  private _accounts = new Map<string, AccountRecord>();

  /**
   * Live record for an address, or undefined if never stored.
   */
  get(address: PublicKey): AccountRecord | undefined {
    return this._accounts.get(address.toBase58());
  }

  /**
   * Live record for an address, creating an empty system-owned one if absent.
   */
  getOrCreate(address: PublicKey): AccountRecord {
    const key = address.toBase58();
    let record = this._accounts.get(key);
    if (record === undefined) {
      record = emptyRecord();
      this._accounts.set(key, record);
    }
    return record;
  }

  set(address: PublicKey, record: AccountRecord): void {
    this._accounts.set(address.toBase58(), record);
  }

  snapshot(): AccountStoreSnapshot {
    const copy = new Map<string, AccountRecord>();
    for (const [key, record] of this._accounts) {
      copy.set(key, cloneRecord(record));
    }
    return copy;
  }

  restore(snapshot: AccountStoreSnapshot): void {
    const restored = new Map<string, AccountRecord>();
    for (const [key, record] of snapshot) {
      restored.set(key, cloneRecord(record));
    }
    this._accounts = restored;
  }

  /**
   * Base58 addresses whose state differs from `snapshot`, sorted.
   */
  changedSince(snapshot: AccountStoreSnapshot): string[] {
    const keys = new Set<string>([...snapshot.keys(), ...this._accounts.keys()]);
    const changed: string[] = [];
    for (const key of keys) {
      const before = snapshot.get(key) ?? emptyRecord();
      const after = this._accounts.get(key) ?? emptyRecord();
      if (!recordsEqual(before, after)) {
        changed.push(key);
      }
    }
    return changed.sort();
  }
}
