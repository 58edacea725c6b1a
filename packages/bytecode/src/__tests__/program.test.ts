import { describe, it, expect } from "vitest";
import { checkProgram, ruleNameAt, type Program } from "../program.js";
import { encodeInstr } from "../codec.js";
import { Opcode } from "../opcodes.js";
import { singleLiteralProgram } from "./fixtures.js";

describe("checkProgram", () => {
  it("accepts a well-formed program", () => {
    expect(checkProgram(singleLiteralProgram())).toEqual([]);
  });

  it("reports operands outside their tables", () => {
    const base = singleLiteralProgram();
    const program: Program = {
      ...base,
      instrs: [...base.instrs.slice(0, 4), encodeInstr(Opcode.Match, 3), ...base.instrs.slice(5)],
    };
    expect(checkProgram(program)).toEqual(["instruction 4: matcher operand 3 out of range (size 1)"]);
  });

  it("reports jumps past the end", () => {
    const base = singleLiteralProgram();
    const program: Program = {
      ...base,
      instrs: [...base.instrs.slice(0, 6), encodeInstr(Opcode.Jump, 7)],
    };
    expect(checkProgram(program)).toEqual(["instruction 6: address operand 7 out of range (size 7)"]);
  });

  it("reports a mismatched instrToRule", () => {
    const program: Program = { ...singleLiteralProgram(), instrToRule: [-1, -1, -1, 0, 0, 0] };
    expect(checkProgram(program)).toEqual(["instrToRule has 6 entries for 7 instructions"]);
  });

  it("reports undecodable instructions and bad rule entries", () => {
    const base = singleLiteralProgram();
    const program: Program = {
      ...base,
      instrs: [...base.instrs.slice(0, 6), [99 << 4]],
      rules: [{ name: 0, displayName: 2, entry: 9 }],
    };
    expect(checkProgram(program)).toEqual([
      "instruction 6: Invalid instruction header 1584",
      "rule 0: name outside the string table",
      "rule 0: entry 9 outside the program",
    ]);
  });

  it("reports thunk parameters outside the string table", () => {
    const program: Program = {
      ...singleLiteralProgram(),
      actions: [{ code: "return x", params: [4] }],
    };
    expect(checkProgram(program)).toEqual(["action 0: parameter outside the string table"]);
  });
});

describe("ruleNameAt", () => {
  it("names the owning rule and skips the prologue", () => {
    const program = singleLiteralProgram();
    expect(ruleNameAt(program, 0)).toBeUndefined();
    expect(ruleNameAt(program, 4)).toBe("A");
    expect(ruleNameAt(program, 7)).toBeUndefined();
  });

  it("prefers the display name", () => {
    const program: Program = {
      ...singleLiteralProgram(),
      strings: ["A", "letter a"],
      rules: [{ name: 0, displayName: 1, entry: 3 }],
    };
    expect(ruleNameAt(program, 3)).toBe("letter a");
  });
});
