import { encodeInstr } from "../codec.js";
import { Opcode, StackId } from "../opcodes.js";
import type { Program } from "../program.js";

/** The program for `A = 'a'`, assembled by hand. */
export function singleLiteralProgram(): Program {
  return {
    init: "",
    instrs: [
      encodeInstr(Opcode.Push, StackId.Call, 3),
      encodeInstr(Opcode.Call),
      encodeInstr(Opcode.Exit),
      encodeInstr(Opcode.Push, StackId.Position),
      encodeInstr(Opcode.Match, 0),
      encodeInstr(Opcode.RestoreIfF),
      encodeInstr(Opcode.Return),
    ],
    matchers: [{ kind: "literal", value: "a", ignoreCase: false }],
    strings: ["A"],
    actions: [],
    predicates: [],
    instrToRule: [-1, -1, -1, 0, 0, 0, 0],
    rules: [{ name: 0, displayName: 0, entry: 3 }],
  };
}
