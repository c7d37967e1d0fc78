/**
 * @strongbox/runtime — In-process host runtime.
 *
 * Implements the collaborator contract programs consume (signer and owner
 * queries, derived addresses, allocation, transfers) over an in-memory
 * account store, and executes signed transactions all-or-nothing.
 *
 * Design rules:
 * - Transactions are atomic: a failure restores every account
 * - Program errors surface unchanged
 * - Privileges are enforced after each instruction, not trusted
 */

// Core
export { LocalValidator, NATIVE_LOADER_ID, DEFAULT_RECENT_BLOCKHASHES } from "./local-validator.js";
export { InvocationAccount, InvocationRuntime } from "./invocation.js";
export { AccountStore, cloneRecord, emptyRecord, recordsEqual, bytesEqual } from "./account-store.js";
export type { AccountStoreSnapshot } from "./account-store.js";
export { buildTransaction } from "./transaction.js";

// Rent
export { minimumBalance, DEFAULT_RENT, ACCOUNT_STORAGE_OVERHEAD } from "./rent.js";

// Types
export type {
  AccountRecord,
  StoredAccount,
  RentConfig,
  LocalValidatorOptions,
  TransactionReceipt,
  RuntimeErrorCode,
} from "./types.js";
export { RuntimeError } from "./types.js";
