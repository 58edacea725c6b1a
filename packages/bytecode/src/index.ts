/**
 * @pegcode/bytecode
 *
 * The instruction encoding shared by the generator and the virtual machine,
 * the program format, and a disassembler.
 *
 * @packageDocumentation
 */

export {
  Opcode,
  StackId,
  MAX_OPERANDS,
  opcodeInfo,
  isOpcode,
  isStackId,
  stackName,
  type OpcodeInfo,
  type OperandKind,
} from "./opcodes.js";

export {
  encodeInstr,
  decodeInstr,
  operandsOf,
  flattenInstrs,
  unflattenInstrs,
  type Instruction,
  type DecodedInstruction,
} from "./codec.js";

export { EncodingError, EncodingArityError, EncodingOperandError, DecodingError } from "./errors.js";

export { matcherKey, type Matcher } from "./matchers.js";

export {
  NO_RULE,
  ruleNameAt,
  checkProgram,
  type Program,
  type ThunkInfo,
  type RuleInfo,
} from "./program.js";

export { disassemble, formatInstr } from "./disassemble.js";
