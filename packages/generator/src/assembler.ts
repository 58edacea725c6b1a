/**
 * Program assembler.
 *
 * Drives compilation through a fixed sequence of states:
 *
 *   Empty → Validated → RulesCompiled → AddressesResolved → Done
 *
 * Rule bodies are compiled into fragments with symbolic operands, laid out
 * after the prologue in declaration order, and encoded once every label and
 * rule entry has an address.
 */

import type { Grammar, Rule } from "@pegcode/grammar";
import {
  NO_RULE,
  Opcode,
  StackId,
  encodeInstr,
  type Instruction,
  type Program,
  type RuleInfo,
} from "@pegcode/bytecode";
import { createLogger, type Logger } from "@pegcode/core";
import { ExpressionCompiler } from "./compile-expr.js";
import { entryOf, fragment, instr, instrCount, type Fragment, type Label, type Operand } from "./fragment.js";
import { TableBuilder } from "./tables.js";
import { AssemblyError, NoRuleError } from "./errors.js";

export interface GenerateOptions {
  /** Receives a debug line per compiled rule and a summary (default: non-verbose `generator` scope) */
  logger?: Logger;
}

export type AssemblerState = "Empty" | "Validated" | "RulesCompiled" | "AddressesResolved" | "Done";

interface PlacedInstr {
  readonly op: Opcode;
  readonly operands: readonly Operand[];
  readonly rule: number;
}

export class ProgramAssembler {
  private state: AssemblerState = "Empty";
  private readonly tables = new TableBuilder();
  private readonly placed: PlacedInstr[] = [];
  private readonly labelAddresses = new Map<Label, number>();
  private readonly ruleEntries = new Map<string, number>();
  /** Entry address per declared rule, duplicates included. */
  private readonly entries: number[] = [];
  private instrs: Instruction[] = [];
  private readonly log: Logger;

  constructor(
    private readonly grammar: Grammar,
    options: GenerateOptions = {}
  ) {
    this.log = options.logger ?? createLogger("generator", { verbose: false });
  }

  get currentState(): AssemblerState {
    return this.state;
  }

  /**
   * Check the grammar has an entry point and seed the string table with rule
   * names, then display names that differ from them.
   */
  validate(): this {
    this.expectState("Empty");
    const { rules } = this.grammar;
    if (rules.length === 0) throw new NoRuleError();

    for (const rule of rules) this.tables.insert("strings", rule.name);
    for (const rule of rules) {
      if (rule.displayName !== undefined && rule.displayName !== rule.name) {
        this.tables.insert("strings", rule.displayName);
      }
    }
    this.state = "Validated";
    return this;
  }

  compileRules(): this {
    this.expectState("Validated");
    const { rules } = this.grammar;
    const compiler = new ExpressionCompiler(this.tables, new Set(rules.map((r) => r.name)));

    const prologue = fragment(
      true,
      instr(Opcode.Push, StackId.Call, entryOf(rules[0].name)),
      instr(Opcode.Call),
      instr(Opcode.Exit)
    );
    this.place(prologue, NO_RULE);

    rules.forEach((rule, index) => {
      if (this.ruleEntries.has(rule.name)) {
        this.log.warn(`rule ${rule.name} is declared more than once; references use the first`);
      } else {
        this.ruleEntries.set(rule.name, this.placed.length);
      }
      const entry = this.placed.length;
      this.entries.push(entry);
      const body = compiler.compileRule(rule);
      this.place(body, index);
      this.log.debug(`rule ${ruleLabel(rule)}: ${instrCount(body)} instructions at ${entry}`);
    });

    this.state = "RulesCompiled";
    return this;
  }

  /** Replace symbolic operands with addresses and encode every instruction. */
  resolveAddresses(): this {
    this.expectState("RulesCompiled");
    this.instrs = this.placed.map(({ op, operands }, address) =>
      encodeInstr(op, ...operands.map((operand) => this.resolve(operand, address)))
    );
    this.state = "AddressesResolved";
    return this;
  }

  finish(): Program {
    this.expectState("AddressesResolved");
    const rules: RuleInfo[] = this.grammar.rules.map((rule, index) => {
      const name = this.tables.insert("strings", rule.name);
      return Object.freeze({
        name,
        displayName: rule.displayName === undefined ? name : this.tables.insert("strings", rule.displayName),
        entry: this.entries[index],
      });
    });
    const tables = this.tables.build();

    const program: Program = Object.freeze({
      init: this.grammar.init ?? "",
      instrs: Object.freeze(this.instrs.map((words) => Object.freeze(words))),
      matchers: tables.matchers,
      strings: tables.strings,
      actions: tables.actions,
      predicates: tables.predicates,
      instrToRule: Object.freeze(this.placed.map((p) => p.rule)),
      rules: Object.freeze(rules),
    });
    this.state = "Done";
    this.log.debug(
      `generated ${program.instrs.length} instructions, ${program.matchers.length} matchers, ` +
        `${program.strings.length} strings, ${program.actions.length} actions, ${program.predicates.length} predicates`
    );
    return program;
  }

  private place(frag: Fragment, rule: number): void {
    for (const item of frag.items) {
      if (item.kind === "mark") {
        this.labelAddresses.set(item.label, this.placed.length);
      } else {
        this.placed.push({ op: item.op, operands: item.operands, rule });
      }
    }
  }

  private resolve(operand: Operand, address: number): number {
    if (typeof operand === "number") return operand;
    const target =
      operand.kind === "label" ? this.labelAddresses.get(operand.label) : this.ruleEntries.get(operand.rule);
    if (target === undefined) {
      const what = operand.kind === "label" ? `label ${operand.label.toString()}` : `rule entry ${operand.rule}`;
      throw new AssemblyError(`Unresolved ${what} at instruction ${address}`);
    }
    return target;
  }

  private expectState(expected: AssemblerState): void {
    if (this.state !== expected) {
      throw new AssemblyError(`Assembler is ${this.state}, expected ${expected}`);
    }
  }
}

function ruleLabel(rule: Rule): string {
  return rule.displayName === undefined ? rule.name : `${rule.name} "${rule.displayName}"`;
}

/**
 * Compile a grammar into a frozen program.
 *
 * @throws NoRuleError when the grammar has no rules
 * @throws UndefinedRuleError when a rule references an undeclared rule
 * @throws GrammarSyntaxError when a character class is malformed
 */
export function generateProgram(grammar: Grammar, options: GenerateOptions = {}): Program {
  return new ProgramAssembler(grammar, options).validate().compileRules().resolveAddresses().finish();
}
