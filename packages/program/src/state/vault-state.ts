/**
 * @strongbox/program — Vault state record.
 *
 * Fixed 48-byte layout, read and written in place over the account's
 * storage buffer:
 *
 *   [0..8)   tag        "Vault!!!"
 *   [8..40)  authority  32-byte address
 *   [40..48) balance    u64 little-endian
 *
 * `read` is the only way to obtain a view over an existing record; it checks
 * length and tag. Accessors then trust the layout.
 */

import { PublicKey } from "@solana/web3.js";
import type { AccountView } from "@strongbox/types";
import { ProgramError } from "../types.js";

export const VAULT_DISCRIMINATOR: Uint8Array = Uint8Array.from([
  0x56, 0x61, 0x75, 0x6c, 0x74, 0x21, 0x21, 0x21,
]);

export const VAULT_LAYOUT = {
  DISCRIMINATOR_OFFSET: 0,
  AUTHORITY_OFFSET: 8,
  BALANCE_OFFSET: 40,
  LEN: 48,
} as const;

const DISCRIMINATOR_LEN = 8;
const AUTHORITY_LEN = 32;

/**
 * Non-owning view over a vault record's bytes.
 */
export class VaultState {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /**
   * Validate the account's layout and return a view over its data.
   *
   * @throws {ProgramError} INVALID_LAYOUT if the data is not exactly 48
   * bytes or does not start with the vault tag
   */
  static read(account: AccountView): VaultState {
    const data = account.data;
    if (data.length !== VAULT_LAYOUT.LEN) {
      throw new ProgramError(
        "INVALID_LAYOUT",
        `Vault data must be ${String(VAULT_LAYOUT.LEN)} bytes, got ${String(data.length)}`,
      );
    }

    for (let i = 0; i < DISCRIMINATOR_LEN; i++) {
      if (data[VAULT_LAYOUT.DISCRIMINATOR_OFFSET + i] !== VAULT_DISCRIMINATOR[i]) {
        throw new ProgramError("INVALID_LAYOUT", "Invalid vault discriminator");
      }
    }

    return new VaultState(data);
  }

  /**
   * Write a fresh record (tag, authority, zero balance) into a newly
   * allocated region and return a view over it.
   *
   * @throws {ProgramError} INVALID_LAYOUT if the region is not 48 bytes
   */
  static initialize(account: AccountView, authority: PublicKey): VaultState {
    const data = account.data;
    if (data.length !== VAULT_LAYOUT.LEN) {
      throw new ProgramError(
        "INVALID_LAYOUT",
        `Cannot initialize vault in ${String(data.length)} bytes`,
      );
    }

    const state = new VaultState(data);
    data.set(VAULT_DISCRIMINATOR, VAULT_LAYOUT.DISCRIMINATOR_OFFSET);
    data.set(authority.toBytes(), VAULT_LAYOUT.AUTHORITY_OFFSET);
    state.setBalance(0n);
    return state;
  }

  /** Raw authority bytes, a view into the record. */
  get authorityBytes(): Uint8Array {
    return this.bytes.subarray(
      VAULT_LAYOUT.AUTHORITY_OFFSET,
      VAULT_LAYOUT.AUTHORITY_OFFSET + AUTHORITY_LEN,
    );
  }

  get authority(): PublicKey {
    return new PublicKey(this.authorityBytes);
  }

  get balance(): bigint {
    return this.view.getBigUint64(VAULT_LAYOUT.BALANCE_OFFSET, true);
  }

  /**
   * Whether the stored authority is `address`, compared byte for byte.
   */
  isAuthority(address: PublicKey): boolean {
    const expected = address.toBytes();
    const stored = this.authorityBytes;
    for (let i = 0; i < AUTHORITY_LEN; i++) {
      if (stored[i] !== expected[i]) return false;
    }
    return true;
  }

  /** Overwrite the balance in place. Callers keep it within u64. */
  setBalance(value: bigint): void {
    this.view.setBigUint64(VAULT_LAYOUT.BALANCE_OFFSET, value, true);
  }
}
