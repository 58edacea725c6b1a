import { Opcode, decodeInstr, operandsOf, type Program } from "@pegcode/bytecode";

/** Instructions as `[opcode name, ...operands]` tuples. */
export function ops(program: Program): Array<[string, ...number[]]> {
  return program.instrs.map((words): [string, ...number[]] => {
    const decoded = decodeInstr(words);
    return [Opcode[decoded.op], ...operandsOf(decoded)];
  });
}
