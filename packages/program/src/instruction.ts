/**
 * @strongbox/program — Instruction decoding.
 *
 * Wire format, little-endian:
 *
 *   0x00 create  [tag, bump]                 2 bytes
 *   0x01 credit  [tag, amount u64]           9 bytes
 *   0x02 debit   [tag, amount u64, bump]     10 bytes
 *
 * Decoding is a pure syntactic parse. It never checks amounts against
 * balances; that belongs to the handlers. Bytes past a tag's minimum
 * length are ignored.
 */

import { INSTRUCTION_MIN_LENGTH, InstructionTag, ProgramError } from "./types.js";
import type { VaultInstruction } from "./types.js";

const AMOUNT_OFFSET = 1;

function requireLength(data: Uint8Array, tag: InstructionTag): void {
  const min = INSTRUCTION_MIN_LENGTH[tag];
  if (data.length < min) {
    throw new ProgramError(
      "INVALID_INSTRUCTION_DATA",
      `Instruction ${String(tag)} needs ${String(min)} bytes, got ${String(data.length)}`,
    );
  }
}

function readAmount(data: Uint8Array): bigint {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return view.getBigUint64(AMOUNT_OFFSET, true);
}

function readByte(data: Uint8Array, offset: number): number {
  const value = data[offset];
  if (value === undefined) {
    throw new ProgramError(
      "INVALID_INSTRUCTION_DATA",
      `Instruction data ends before byte ${String(offset)}`,
    );
  }
  return value;
}

/**
 * Decode raw instruction bytes into a typed instruction.
 *
 * @throws {ProgramError} INVALID_INSTRUCTION_DATA for empty or short input
 * and for unknown tags
 */
export function decodeInstruction(data: Uint8Array): VaultInstruction {
  if (data.length === 0) {
    throw new ProgramError("INVALID_INSTRUCTION_DATA", "Instruction data is empty");
  }

  const tag = readByte(data, 0);
  switch (tag) {
    case InstructionTag.Create:
      requireLength(data, InstructionTag.Create);
      return { kind: "create", bump: readByte(data, 1) };

    case InstructionTag.Credit:
      requireLength(data, InstructionTag.Credit);
      return { kind: "credit", amount: readAmount(data) };

    case InstructionTag.Debit:
      requireLength(data, InstructionTag.Debit);
      return { kind: "debit", amount: readAmount(data), bump: readByte(data, 9) };

    default:
      throw new ProgramError(
        "INVALID_INSTRUCTION_DATA",
        `Unknown operation tag: ${String(tag)}`,
      );
  }
}
