/**
 * Human-readable program listing.
 *
 * ```text
 * 0000  -  Push       cstack 3
 * 0001  -  Call
 * 0002  -  Exit
 * 0003  A  Push       pstack
 * 0004  A  Match      0  ; "a"
 * 0005  A  RestoreIfF
 * 0006  A  Return
 * ```
 */

import { decodeInstr, operandsOf } from "./codec.js";
import { matcherKey } from "./matchers.js";
import { isStackId, opcodeInfo, stackName, type OperandKind } from "./opcodes.js";
import { ruleNameAt, type Program, type ThunkInfo } from "./program.js";

function thunkNote(program: Program, thunk: ThunkInfo | undefined): string | undefined {
  if (!thunk || thunk.params.length === 0) return undefined;
  return `(${thunk.params.map((p) => program.strings.at(p) ?? `?${p}`).join(", ")})`;
}

function operandText(kind: OperandKind | undefined, value: number): string {
  return kind === "stack" && isStackId(value) ? stackName(value) : String(value);
}

function operandNote(program: Program, kind: OperandKind | undefined, value: number): string | undefined {
  switch (kind) {
    case "matcher": {
      const matcher = program.matchers.at(value);
      return matcher && matcherKey(matcher);
    }
    case "string":
      return JSON.stringify(program.strings.at(value));
    case "action":
      return thunkNote(program, program.actions.at(value));
    case "predicate":
      return thunkNote(program, program.predicates.at(value));
    default:
      return undefined;
  }
}

/** Render one instruction, without address or owner columns. */
export function formatInstr(program: Program, address: number): string {
  const decoded = decodeInstr(program.instrs[address]);
  const info = opcodeInfo(decoded.op);
  const name = info?.name ?? `op${decoded.op}`;
  const operands = operandsOf(decoded);
  if (operands.length === 0) return name;

  const kinds = info?.operands ?? [];
  const text = `${name.padEnd(10)} ${operands.map((v, i) => operandText(kinds[i], v)).join(" ")}`;
  const notes = operands
    .map((v, i) => operandNote(program, kinds[i], v))
    .filter((note): note is string => note !== undefined);
  return notes.length > 0 ? `${text}  ; ${notes.join(" ")}` : text;
}

/** Render the whole program, one instruction per line, prefixed by the init block as comments. */
export function disassemble(program: Program): string {
  const owners = program.instrs.map((_, address) => ruleNameAt(program, address) ?? "-");
  const width = owners.reduce((w, owner) => Math.max(w, owner.length), 1);

  const lines = program.init === "" ? [] : program.init.split("\n").map((line) => `; ${line}`);
  program.instrs.forEach((_, address) => {
    const addr = String(address).padStart(4, "0");
    lines.push(`${addr}  ${owners[address].padEnd(width)}  ${formatInstr(program, address)}`);
  });
  return lines.join("\n");
}
