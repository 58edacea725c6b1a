/**
 * Instruction codec.
 *
 * An instruction is a header word followed by one word per operand. The
 * header holds the opcode in its upper bits and the operand count in its
 * low four bits, so a packed word stream can be split without the opcode
 * table. Operands are signed 32-bit integers.
 */

import { MAX_OPERANDS, isStackId, opcodeInfo, type Opcode } from "./opcodes.js";
import { DecodingError, EncodingArityError, EncodingOperandError } from "./errors.js";

export type Instruction = readonly number[];

export interface DecodedInstruction {
  readonly op: Opcode;
  /** Number of operands present. */
  readonly count: number;
  /** Operands; absent ones read as 0. */
  readonly arg0: number;
  readonly arg1: number;
  readonly arg2: number;
}

const COUNT_BITS = 4;
const COUNT_MASK = (1 << COUNT_BITS) - 1;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

/**
 * Encode an opcode and its operands.
 *
 * @throws EncodingArityError when the operand count is outside the opcode's arity
 * @throws EncodingOperandError for unknown opcodes, stack operands naming no
 *   stack and values that are not 32-bit integers
 */
export function encodeInstr(op: Opcode, ...operands: number[]): number[] {
  const info = opcodeInfo(op);
  if (!info) throw new EncodingOperandError(`Unknown opcode ${op}`);

  if (operands.length < info.minArgs || operands.length > info.operands.length) {
    throw new EncodingArityError(info.name, info.minArgs, info.operands.length, operands.length);
  }

  operands.forEach((value, i) => {
    if (!isInt32(value)) {
      throw new EncodingOperandError(`${info.name} operand ${i} must be a 32-bit integer, got ${value}`);
    }
    if (info.operands[i] === "stack" && !isStackId(value)) {
      throw new EncodingOperandError(`${info.name} operand ${i} names no stack: ${value}`);
    }
  });

  return [(op << COUNT_BITS) | operands.length, ...operands];
}

/**
 * Decode the words of one instruction.
 *
 * @throws DecodingError if the words are not a single encoded instruction
 */
export function decodeInstr(words: ArrayLike<number>): DecodedInstruction {
  if (words.length === 0) throw new DecodingError("Empty instruction");
  const header = words[0];
  const count = header & COUNT_MASK;
  const info = opcodeInfo(header >> COUNT_BITS);
  if (!info || !isInt32(header) || header < 0) {
    throw new DecodingError(`Invalid instruction header ${header}`);
  }
  if (count > info.operands.length || count < info.minArgs || words.length !== count + 1) {
    throw new DecodingError(
      `${info.name} header announces ${count} operands, instruction has ${words.length - 1}`
    );
  }
  return {
    op: info.op,
    count,
    arg0: count > 0 ? words[1] : 0,
    arg1: count > 1 ? words[2] : 0,
    arg2: count > 2 ? words[3] : 0,
  };
}

/** Operands of a decoded instruction, without the padding zeros. */
export function operandsOf(decoded: DecodedInstruction): number[] {
  return [decoded.arg0, decoded.arg1, decoded.arg2].slice(0, decoded.count);
}

/** Pack instructions into one word stream. */
export function flattenInstrs(instrs: readonly Instruction[]): Int32Array {
  const size = instrs.reduce((n, instr) => n + instr.length, 0);
  const words = new Int32Array(size);
  let offset = 0;
  for (const instr of instrs) {
    words.set(instr, offset);
    offset += instr.length;
  }
  return words;
}

/**
 * Split a packed word stream back into instructions, using the operand count
 * carried by each header.
 */
export function unflattenInstrs(words: ArrayLike<number>): number[][] {
  const instrs: number[][] = [];
  let i = 0;
  while (i < words.length) {
    const count = words[i] & COUNT_MASK;
    if (count > MAX_OPERANDS || i + count >= words.length) {
      throw new DecodingError(`Truncated instruction at word ${i}`);
    }
    const instr = Array.from({ length: count + 1 }, (_, k) => words[i + k]);
    decodeInstr(instr);
    instrs.push(instr);
    i += count + 1;
  }
  return instrs;
}
