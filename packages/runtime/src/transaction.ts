/**
 * @strongbox/runtime — Transaction assembly.
 *
 * Builds and signs a transaction against the validator's current
 * blockhash. The first signer pays fees and is always a signer.
 */

import { Transaction } from "@solana/web3.js";
import type { Keypair, TransactionInstruction } from "@solana/web3.js";

export function buildTransaction(
  blockhash: string,
  instructions: readonly TransactionInstruction[],
  signers: readonly [Keypair, ...Keypair[]],
): Transaction {
  const [feePayer] = signers;
  const tx = new Transaction({
    feePayer: feePayer.publicKey,
    blockhash,
    lastValidBlockHeight: 0,
  });
  tx.add(...instructions);
  tx.sign(...signers);
  return tx;
}
