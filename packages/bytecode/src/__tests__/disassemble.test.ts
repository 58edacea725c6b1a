import { describe, it, expect } from "vitest";
import { disassemble, formatInstr } from "../disassemble.js";
import { encodeInstr } from "../codec.js";
import { Opcode, StackId } from "../opcodes.js";
import type { Program } from "../program.js";
import { singleLiteralProgram } from "./fixtures.js";

describe("disassemble", () => {
  it("lists every instruction with its address and owning rule", () => {
    expect(disassemble(singleLiteralProgram()).split("\n")).toEqual([
      "0000  -  Push       cstack 3",
      "0001  -  Call",
      "0002  -  Exit",
      "0003  A  Push       pstack",
      '0004  A  Match      0  ; "a"',
      "0005  A  RestoreIfF",
      "0006  A  Return",
    ]);
  });

  it("prints the init block as comments", () => {
    const program: Program = { ...singleLiteralProgram(), init: "let depth = 0;\nreturn { depth };" };
    expect(disassemble(program).split("\n").slice(0, 3)).toEqual([
      "; let depth = 0;",
      "; return { depth };",
      "0000  -  Push       cstack 3",
    ]);
  });
});

describe("formatInstr", () => {
  const program: Program = {
    ...singleLiteralProgram(),
    instrs: [
      encodeInstr(Opcode.StoreIfT, 1),
      encodeInstr(Opcode.CallA, 0),
      encodeInstr(Opcode.Pop, StackId.Position),
    ],
    strings: ["A", "head"],
    actions: [{ code: "return head", params: [1] }],
    instrToRule: [0, 0, 0],
  };

  it("annotates string and action operands", () => {
    expect(formatInstr(program, 0)).toBe('StoreIfT   1  ; "head"');
    expect(formatInstr(program, 1)).toBe("CallA      0  ; (head)");
    expect(formatInstr(program, 2)).toBe("Pop        pstack");
  });
});
