/**
 * End-to-end tests: the vault program deployed on the local validator,
 * driven by signed transactions.
 *
 * Covers:
 * - create → credit → debit lifecycle and lamport movement
 * - Independent vaults for independent authorities
 * - Authorization failures (signature, ownership, authority, derivation)
 * - Balance guards (insufficient funds, overflow)
 * - All-or-nothing commit: failed requests leave every account unchanged
 */

import { describe, it, expect } from "vitest";
import { U64_MAX } from "@strongbox/types";
import { RuntimeError } from "@strongbox/runtime";
import { findVaultAddress } from "../src/pda.js";
import { ProgramError } from "../src/types.js";
import {
  ONE_SOL,
  PROGRAM_ID,
  authorityWithBump,
  captureError,
  create,
  createData,
  credit,
  creditData,
  debit,
  debitData,
  keypair,
  readVault,
  send,
  setupVault,
  vaultBytes,
  vaultInstruction,
} from "./helpers.js";

const RENT_EXEMPT_48 = 1_224_960n;
const AIRDROP = 10n * ONE_SOL;
const VAULT_TAG = [0x56, 0x61, 0x75, 0x6c, 0x74, 0x21, 0x21, 0x21];

describe("vault lifecycle", () => {
  describe("create", () => {
    it("allocates a rent-exempt record owned by the program", () => {
      const fx = setupVault();
      create(fx);

      const vault = readVault(fx.validator, fx.vault);
      expect(vault.discriminator).toEqual(VAULT_TAG);
      expect(vault.authority.equals(fx.authority.publicKey)).toBe(true);
      expect(vault.balance).toBe(0n);
      expect(vault.owner.equals(PROGRAM_ID)).toBe(true);
      expect(vault.lamports).toBe(RENT_EXEMPT_48);
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(AIRDROP - RENT_EXEMPT_48);
    });

    it("creates a vault at an address that was already sent lamports", () => {
      const fx = setupVault();
      fx.validator.airdrop(fx.vault, 1n);

      create(fx);

      const vault = readVault(fx.validator, fx.vault);
      expect(vault.balance).toBe(0n);
      expect(vault.authority.equals(fx.authority.publicKey)).toBe(true);
      expect(vault.owner.equals(PROGRAM_ID)).toBe(true);
      expect(vault.lamports).toBe(RENT_EXEMPT_48);
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(AIRDROP - (RENT_EXEMPT_48 - 1n));
    });

    it("cannot create the same vault twice", () => {
      const fx = setupVault();
      create(fx);

      const error = captureError(() => create(fx));

      expect(error).toBeInstanceOf(RuntimeError);
      expect(error).toHaveProperty("code", "ACCOUNT_ALREADY_IN_USE");
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(AIRDROP - RENT_EXEMPT_48);
    });

    it("rejects a seed byte that does not derive the vault", () => {
      const fx = setupVault();
      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: fx.authority.publicKey, vault: fx.vault }, createData(fx.bump - 1)),
          [fx.authority],
        ),
      );

      expect(error).toHaveProperty("code", "DERIVATION_MISMATCH");
      expect(fx.validator.getAccount(fx.vault)).toBeUndefined();
    });

    it("rejects a vault address derived for another authority", () => {
      const fx = setupVault();
      const other = setupVault(keypair(2));
      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: fx.authority.publicKey, vault: other.vault }, createData(other.bump)),
          [fx.authority],
        ),
      );

      expect(error).toHaveProperty("code", "DERIVATION_MISMATCH");
    });
  });

  describe("credit and debit", () => {
    it("create with seed 254, credit 3 SOL, debit 1 SOL leaves 2 SOL", () => {
      const fx = setupVault(authorityWithBump(254));
      expect(fx.bump).toBe(254);

      create(fx);
      credit(fx, 3n * ONE_SOL);
      debit(fx, ONE_SOL);

      const vault = readVault(fx.validator, fx.vault);
      expect(vault.balance).toBe(2n * ONE_SOL);
      expect(vault.lamports).toBe(RENT_EXEMPT_48 + 2n * ONE_SOL);
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(
        AIRDROP - RENT_EXEMPT_48 - 2n * ONE_SOL,
      );
    });

    it("keeps two authorities' vaults independent", () => {
      const first = setupVault(keypair(1));
      const secondAuthority = keypair(2);
      first.validator.airdrop(secondAuthority.publicKey, AIRDROP);
      const [secondVault, secondBump] = findVaultAddress(secondAuthority.publicKey, PROGRAM_ID);
      const second = {
        validator: first.validator,
        authority: secondAuthority,
        vault: secondVault,
        bump: secondBump,
      };

      create(first);
      create(second);
      credit(first, 3n * ONE_SOL);
      credit(second, ONE_SOL);
      debit(first, ONE_SOL);
      debit(second, ONE_SOL);

      expect(first.vault.equals(second.vault)).toBe(false);

      const firstRecord = readVault(first.validator, first.vault);
      expect(firstRecord.authority.equals(first.authority.publicKey)).toBe(true);
      expect(firstRecord.balance).toBe(2n * ONE_SOL);
      expect(firstRecord.lamports).toBe(RENT_EXEMPT_48 + 2n * ONE_SOL);

      const secondRecord = readVault(first.validator, second.vault);
      expect(secondRecord.authority.equals(secondAuthority.publicKey)).toBe(true);
      expect(secondRecord.balance).toBe(0n);
      expect(secondRecord.lamports).toBe(RENT_EXEMPT_48);
      expect(first.validator.getBalance(secondAuthority.publicKey)).toBe(AIRDROP - RENT_EXEMPT_48);
    });

    it("accumulates multiple credits", () => {
      const fx = setupVault();
      create(fx);
      credit(fx, ONE_SOL);
      credit(fx, 2n * ONE_SOL);

      expect(readVault(fx.validator, fx.vault).balance).toBe(3n * ONE_SOL);
    });

    it("accepts a zero credit without changing any account", () => {
      const fx = setupVault();
      create(fx);

      const receipt = credit(fx, 0n);

      expect(receipt.changedAccounts).toEqual([]);
      expect(readVault(fx.validator, fx.vault).balance).toBe(0n);
    });

    it("reports the authority and vault as changed after a credit", () => {
      const fx = setupVault();
      create(fx);

      const receipt = credit(fx, 5n);

      expect(receipt.changedAccounts).toEqual(
        [fx.authority.publicKey.toBase58(), fx.vault.toBase58()].sort(),
      );
    });

    it("drains the vault back to the rent-exempt minimum", () => {
      const fx = setupVault();
      create(fx);
      credit(fx, ONE_SOL);
      debit(fx, ONE_SOL);

      const vault = readVault(fx.validator, fx.vault);
      expect(vault.balance).toBe(0n);
      expect(vault.lamports).toBe(RENT_EXEMPT_48);
    });
  });

  describe("balance guards", () => {
    it("debit 1 against a fresh vault fails INSUFFICIENT_FUNDS", () => {
      const fx = setupVault();
      create(fx);

      const error = captureError(() => debit(fx, 1n));

      expect(error).toBeInstanceOf(ProgramError);
      expect(error).toHaveProperty("code", "INSUFFICIENT_FUNDS");
      expect(readVault(fx.validator, fx.vault).balance).toBe(0n);
    });

    it("credit past the u64 maximum fails OVERFLOW and rolls back the transfer", () => {
      const fx = setupVault();
      fx.validator.setAccount(fx.vault, {
        lamports: RENT_EXEMPT_48,
        data: vaultBytes(fx.authority.publicKey, U64_MAX),
        owner: PROGRAM_ID,
        executable: false,
      });

      const error = captureError(() => credit(fx, 1n));

      expect(error).toHaveProperty("code", "OVERFLOW");
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(AIRDROP);
      expect(readVault(fx.validator, fx.vault).balance).toBe(U64_MAX);
      expect(readVault(fx.validator, fx.vault).lamports).toBe(RENT_EXEMPT_48);
    });
  });

  describe("authorization", () => {
    it("rejects credit from a signer who is not the vault authority", () => {
      const fx = setupVault();
      create(fx);
      credit(fx, ONE_SOL);
      const intruder = keypair(2);
      fx.validator.airdrop(intruder.publicKey, AIRDROP);
      const before = readVault(fx.validator, fx.vault);

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: intruder.publicKey, vault: fx.vault }, creditData(5n)),
          [intruder],
        ),
      );

      expect(error).toHaveProperty("code", "AUTHORITY_MISMATCH");
      expect(readVault(fx.validator, fx.vault)).toEqual(before);
      expect(fx.validator.getBalance(intruder.publicKey)).toBe(AIRDROP);
    });

    it("rejects debit from a signer who is not the vault authority", () => {
      const fx = setupVault();
      create(fx);
      credit(fx, ONE_SOL);
      const intruder = keypair(2);
      const before = readVault(fx.validator, fx.vault);

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: intruder.publicKey, vault: fx.vault }, debitData(ONE_SOL, fx.bump)),
          [intruder],
        ),
      );

      expect(error).toHaveProperty("code", "AUTHORITY_MISMATCH");
      expect(readVault(fx.validator, fx.vault)).toEqual(before);
    });

    it("rejects credit when the authority did not sign", () => {
      const fx = setupVault();
      create(fx);
      const payer = keypair(5);

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction(
            { authority: fx.authority.publicKey, vault: fx.vault, authoritySigns: false },
            creditData(5n),
          ),
          [payer],
        ),
      );

      expect(error).toHaveProperty("code", "MISSING_SIGNATURE");
    });

    it("rejects a vault owned by another program before reading it", () => {
      const fx = setupVault();
      const foreign = keypair(30).publicKey;
      fx.validator.setAccount(foreign, {
        lamports: RENT_EXEMPT_48,
        data: vaultBytes(fx.authority.publicKey, 100n),
        owner: keypair(31).publicKey,
        executable: false,
      });

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: fx.authority.publicKey, vault: foreign }, creditData(5n)),
          [fx.authority],
        ),
      );

      expect(error).toHaveProperty("code", "ILLEGAL_OWNER");
      expect(fx.validator.getBalance(fx.authority.publicKey)).toBe(AIRDROP);
    });

    it("rejects a program-owned region that is not a vault record", () => {
      const fx = setupVault();
      fx.validator.setAccount(fx.vault, {
        lamports: RENT_EXEMPT_48,
        data: new Uint8Array(40),
        owner: PROGRAM_ID,
        executable: false,
      });

      const error = captureError(() => credit(fx, 5n));

      expect(error).toHaveProperty("code", "INVALID_LAYOUT");
    });

    it("rejects debit with a seed byte that does not derive the vault", () => {
      const fx = setupVault();
      create(fx);
      credit(fx, ONE_SOL);

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction({ authority: fx.authority.publicKey, vault: fx.vault }, debitData(1n, fx.bump - 1)),
          [fx.authority],
        ),
      );

      expect(error).toHaveProperty("code", "DERIVATION_MISMATCH");
      expect(readVault(fx.validator, fx.vault).balance).toBe(ONE_SOL);
    });

    it("rejects a transfer service other than the system program", () => {
      const fx = setupVault();
      create(fx);

      const error = captureError(() =>
        send(
          fx.validator,
          vaultInstruction(
            { authority: fx.authority.publicKey, vault: fx.vault, transferService: PROGRAM_ID },
            creditData(5n),
          ),
          [fx.authority],
        ),
      );

      expect(error).toHaveProperty("code", "INCORRECT_PROGRAM_ID");
      expect(readVault(fx.validator, fx.vault).balance).toBe(0n);
    });
  });
});
