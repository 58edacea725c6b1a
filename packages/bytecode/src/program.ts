/**
 * The compiled program.
 *
 * `instrs` is addressed by instruction index, not by word. Every other table
 * is referenced by index from instruction operands.
 */

import type { Matcher } from "./matchers.js";
import { decodeInstr, operandsOf, type DecodedInstruction, type Instruction } from "./codec.js";
import { opcodeInfo, type OperandKind } from "./opcodes.js";
import { DecodingError } from "./errors.js";

/** `instrToRule` entry of instructions that belong to no rule. */
export const NO_RULE = -1;

/** A semantic action or predicate body and the labels it may read. */
export interface ThunkInfo {
  readonly code: string;
  /** String-table indices of the label names passed to the code, in order. */
  readonly params: readonly number[];
}

export interface RuleInfo {
  /** String-table index of the rule name. */
  readonly name: number;
  /** String-table index of the display name (same as `name` when absent). */
  readonly displayName: number;
  /** Address of the rule's first instruction. */
  readonly entry: number;
}

export interface Program {
  /** Code run once before parsing begins, possibly empty. */
  readonly init: string;
  readonly instrs: readonly Instruction[];
  readonly matchers: readonly Matcher[];
  readonly strings: readonly string[];
  readonly actions: readonly ThunkInfo[];
  readonly predicates: readonly ThunkInfo[];
  /** Owning rule index per instruction, or `NO_RULE`. */
  readonly instrToRule: readonly number[];
  readonly rules: readonly RuleInfo[];
}

/** Display name of the rule owning the instruction at `address`. */
export function ruleNameAt(program: Program, address: number): string | undefined {
  const ruleIndex = program.instrToRule.at(address);
  if (ruleIndex === undefined || ruleIndex === NO_RULE || address < 0) return undefined;
  const info = program.rules.at(ruleIndex);
  return info === undefined ? undefined : program.strings.at(info.displayName);
}

function tableSize(program: Program, kind: OperandKind): number | undefined {
  switch (kind) {
    case "matcher":
      return program.matchers.length;
    case "action":
      return program.actions.length;
    case "predicate":
      return program.predicates.length;
    case "string":
      return program.strings.length;
    case "address":
      return program.instrs.length;
    case "stack":
    case "value":
      return undefined;
  }
}

/**
 * List violations of the program invariants: parallel `instrToRule`,
 * decodable instructions, operands within their tables, rule and thunk
 * entries within theirs. An empty list means the program is well formed.
 */
export function checkProgram(program: Program): string[] {
  const problems: string[] = [];
  const { instrs, instrToRule, rules, strings } = program;

  if (instrToRule.length !== instrs.length) {
    problems.push(`instrToRule has ${instrToRule.length} entries for ${instrs.length} instructions`);
  }

  instrs.forEach((instr, address) => {
    let decoded: DecodedInstruction;
    try {
      decoded = decodeInstr(instr);
    } catch (error) {
      if (!(error instanceof DecodingError)) throw error;
      problems.push(`instruction ${address}: ${error.message}`);
      return;
    }
    const info = opcodeInfo(decoded.op);
    operandsOf(decoded).forEach((value, i) => {
      const kind = info?.operands[i];
      const size = kind === undefined ? undefined : tableSize(program, kind);
      if (size !== undefined && (value < 0 || value >= size)) {
        problems.push(`instruction ${address}: ${kind} operand ${value} out of range (size ${size})`);
      }
    });
  });

  instrToRule.forEach((ruleIndex, address) => {
    if (ruleIndex !== NO_RULE && (ruleIndex < 0 || ruleIndex >= rules.length)) {
      problems.push(`instrToRule ${address}: no rule ${ruleIndex}`);
    }
  });

  rules.forEach((rule, i) => {
    if (rule.name < 0 || rule.name >= strings.length || rule.displayName < 0 || rule.displayName >= strings.length) {
      problems.push(`rule ${i}: name outside the string table`);
    }
    if (rule.entry < 0 || rule.entry >= instrs.length) {
      problems.push(`rule ${i}: entry ${rule.entry} outside the program`);
    }
  });

  for (const [kind, thunks] of [
    ["action", program.actions],
    ["predicate", program.predicates],
  ] as const) {
    thunks.forEach((thunk, i) => {
      if (thunk.params.some((p) => p < 0 || p >= strings.length)) {
        problems.push(`${kind} ${i}: parameter outside the string table`);
      }
    });
  }

  return problems;
}
