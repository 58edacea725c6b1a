/**
 * Opcode table.
 *
 * Each opcode declares the kinds of its operands and how many of them are
 * required; the encoder rejects any other operand count.
 */

export enum Opcode {
  Call = 0,
  CallA = 1,
  CallB = 2,
  ClearF = 3,
  Exit = 4,
  Jump = 5,
  JumpIfF = 6,
  JumpIfNotF = 7,
  Match = 8,
  NotF = 9,
  Pop = 10,
  PopF = 11,
  Push = 12,
  Restore = 13,
  RestoreIfF = 14,
  Return = 15,
  StoreIfT = 16,
}

export enum StackId {
  /** Return addresses and loop bookkeeping. */
  Call = 0,
  /** Saved input positions. */
  Position = 1,
}

export type OperandKind =
  | "stack"
  | "value"
  | "address"
  | "matcher"
  | "action"
  | "predicate"
  | "string";

export interface OpcodeInfo {
  readonly op: Opcode;
  readonly name: string;
  /** Operands that must be present. */
  readonly minArgs: number;
  /** All operands the opcode accepts, in order. */
  readonly operands: readonly OperandKind[];
}

export const MAX_OPERANDS = 3;

function info(op: Opcode, operands: readonly OperandKind[], minArgs = operands.length): OpcodeInfo {
  return { op, name: Opcode[op], minArgs, operands };
}

/** Indexed by opcode value. */
const OPCODE_TABLE: readonly OpcodeInfo[] = [
  info(Opcode.Call, []),
  info(Opcode.CallA, ["action"]),
  info(Opcode.CallB, ["predicate"]),
  info(Opcode.ClearF, []),
  info(Opcode.Exit, []),
  info(Opcode.Jump, ["address"]),
  info(Opcode.JumpIfF, ["address"]),
  info(Opcode.JumpIfNotF, ["address"]),
  info(Opcode.Match, ["matcher"]),
  info(Opcode.NotF, []),
  info(Opcode.Pop, ["stack"]),
  info(Opcode.PopF, []),
  info(Opcode.Push, ["stack", "value"], 1),
  info(Opcode.Restore, []),
  info(Opcode.RestoreIfF, []),
  info(Opcode.Return, []),
  info(Opcode.StoreIfT, ["string"]),
];

export function opcodeInfo(op: number): OpcodeInfo | undefined {
  const found = Number.isInteger(op) ? OPCODE_TABLE.at(op) : undefined;
  return found && found.op === op ? found : undefined;
}

export function isOpcode(op: number): op is Opcode {
  return opcodeInfo(op) !== undefined;
}

export function isStackId(value: number): value is StackId {
  return value === StackId.Call || value === StackId.Position;
}

export function stackName(id: StackId): string {
  return id === StackId.Call ? "cstack" : "pstack";
}
