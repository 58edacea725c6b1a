import { describe, it, expect, vi, afterEach } from "vitest";
import {
  action,
  and,
  any,
  choice,
  cls,
  grammar,
  label,
  lit,
  not,
  opt,
  plus,
  pred,
  readGrammar,
  ref,
  rule,
  seq,
  star,
  withInit,
} from "@pegcode/grammar";
import { checkProgram, encodeInstr, Opcode, StackId } from "@pegcode/bytecode";
import { config, createLogger, silentLogger } from "@pegcode/core";
import { generateProgram, ProgramAssembler } from "../assembler.js";
import { ExpressionCompiler } from "../compile-expr.js";
import { TableBuilder } from "../tables.js";
import { AssemblyError, NoRuleError, UndefinedRuleError } from "../errors.js";
import { ops } from "./helpers.js";

const quiet = { logger: silentLogger };

describe("generateProgram", () => {
  it("rejects a grammar without rules", () => {
    expect(() => generateProgram(grammar(), quiet)).toThrow(NoRuleError);
  });

  it("compiles a single literal rule", () => {
    const program = generateProgram(grammar(rule("A", lit("a"))), quiet);
    expect(program.instrs).toEqual([
      encodeInstr(Opcode.Push, StackId.Call, 3),
      encodeInstr(Opcode.Call),
      encodeInstr(Opcode.Exit),
      encodeInstr(Opcode.Push, StackId.Position),
      encodeInstr(Opcode.Match, 0),
      encodeInstr(Opcode.RestoreIfF),
      encodeInstr(Opcode.Return),
    ]);
    expect(program.matchers).toEqual([{ kind: "literal", value: "a", ignoreCase: false }]);
    expect(program.strings).toEqual(["A"]);
    expect(program.instrToRule).toEqual([-1, -1, -1, 0, 0, 0, 0]);
    expect(program.rules).toEqual([{ name: 0, displayName: 0, entry: 3 }]);
    expect(program.init).toBe("");
  });

  it("adds a distinct display name to the strings only", () => {
    const plain = generateProgram(grammar(rule("A", lit("a"))), quiet);
    const named = generateProgram(grammar(rule("A", lit("a"), "Z")), quiet);
    expect(named.strings).toEqual(["A", "Z"]);
    expect(named.instrs).toEqual(plain.instrs);
    expect(named.matchers).toEqual(plain.matchers);
    expect(named.instrToRule).toEqual(plain.instrToRule);
    expect(named.rules).toEqual([{ name: 0, displayName: 1, entry: 3 }]);
  });

  it("enters rule names before display names", () => {
    const program = generateProgram(
      grammar(rule("A", ref("B"), "first"), rule("B", lit("b"), "second")),
      quiet
    );
    expect(program.strings).toEqual(["A", "B", "first", "second"]);
  });

  it("shares one matcher between repeated literals", () => {
    const program = generateProgram(grammar(rule("A", seq(lit("a"), lit("a")))), quiet);
    expect(program.matchers).toHaveLength(1);
    expect(ops(program)).toEqual([
      ["Push", 0, 3],
      ["Call"],
      ["Exit"],
      ["Push", 1],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["JumpIfF", 11],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["RestoreIfF"],
      ["Return"],
    ]);
  });

  it("back-patches rule entries", () => {
    const program = generateProgram(grammar(rule("A", ref("B")), rule("B", lit("b"))), quiet);
    expect(ops(program)).toEqual([
      ["Push", 0, 3],
      ["Call"],
      ["Exit"],
      ["Push", 0, 6],
      ["Call"],
      ["Return"],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["Return"],
    ]);
    expect(program.instrToRule).toEqual([-1, -1, -1, 0, 0, 0, 1, 1, 1, 1]);
    expect(program.rules.map((r) => r.entry)).toEqual([3, 6]);
  });

  it("reports references to undefined rules", () => {
    const g = grammar(rule("A", ref("B")));
    expect(() => generateProgram(g, quiet)).toThrow(UndefinedRuleError);
    expect(() => generateProgram(g, quiet)).toThrow('Rule "A" references undefined rule "B"');
  });

  it("lowers choices without extra guards", () => {
    const program = generateProgram(grammar(rule("A", choice(lit("a"), lit("b")))), quiet);
    expect(ops(program).slice(3)).toEqual([
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["JumpIfNotF", 10],
      ["Push", 1],
      ["Match", 1],
      ["RestoreIfF"],
      ["Return"],
    ]);
  });

  it("lowers repetitions", () => {
    const many = generateProgram(grammar(rule("A", star(lit("a")))), quiet);
    expect(ops(many).slice(3)).toEqual([
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["JumpIfNotF", 3],
      ["ClearF"],
      ["Return"],
    ]);

    const some = generateProgram(grammar(rule("A", plus(lit("a")))), quiet);
    expect(ops(some).slice(3)).toEqual([
      ["Push", 0, 0],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["JumpIfF", 11],
      ["Pop", 0],
      ["Push", 0, 1],
      ["Jump", 4],
      ["PopF"],
      ["Return"],
    ]);
  });

  it("lowers lookahead without consuming input", () => {
    const ahead = generateProgram(grammar(rule("A", and(lit("a")))), quiet);
    expect(ops(ahead).slice(3)).toEqual([
      ["Push", 1],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["Restore"],
      ["Return"],
    ]);

    const notAhead = generateProgram(grammar(rule("A", not(lit("a")))), quiet);
    expect(ops(notAhead).slice(3)).toEqual([
      ["Push", 1],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["Restore"],
      ["NotF"],
      ["Return"],
    ]);
  });

  it("guards an optional sequence and clears its failure", () => {
    const program = generateProgram(grammar(rule("A", opt(seq(lit("a"), lit("b"))))), quiet);
    expect(ops(program).slice(3)).toEqual([
      ["Push", 1],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["JumpIfF", 11],
      ["Push", 1],
      ["Match", 1],
      ["RestoreIfF"],
      ["RestoreIfF"],
      ["ClearF"],
      ["Return"],
    ]);
  });

  it("lowers the any-character matcher", () => {
    const program = generateProgram(grammar(rule("A", any())), quiet);
    expect(program.matchers).toEqual([{ kind: "any" }]);
    expect(ops(program).slice(3)).toEqual([["Push", 1], ["Match", 0], ["RestoreIfF"], ["Return"]]);
  });

  it("lowers an empty sequence to success and an empty choice to failure", () => {
    const empty = generateProgram(grammar(rule("A", seq())), quiet);
    expect(ops(empty).slice(3)).toEqual([["ClearF"], ["Return"]]);

    const none = generateProgram(grammar(rule("A", choice())), quiet);
    expect(ops(none).slice(3)).toEqual([["ClearF"], ["NotF"], ["Return"]]);
  });

  it("binds labels and passes them to actions", () => {
    const program = generateProgram(
      grammar(rule("A", action(seq(label("x", lit("a")), label("y", lit("b"))), "return x + y"))),
      quiet
    );
    expect(program.strings).toEqual(["A", "x", "y"]);
    expect(program.actions).toEqual([{ code: "return x + y", params: [1, 2] }]);
    expect(ops(program).slice(3)).toEqual([
      ["Push", 1],
      ["Push", 1],
      ["Push", 1],
      ["Push", 1],
      ["Match", 0],
      ["RestoreIfF"],
      ["StoreIfT", 1],
      ["JumpIfF", 16],
      ["Push", 1],
      ["Push", 1],
      ["Match", 1],
      ["RestoreIfF"],
      ["StoreIfT", 2],
      ["JumpIfF", 18],
      ["CallA", 0],
      ["Pop", 1],
      ["RestoreIfF"],
      ["Return"],
    ]);
  });

  it("numbers nested actions outermost first and scopes their labels", () => {
    const program = generateProgram(
      grammar(
        rule(
          "A",
          action(seq(label("x", lit("a")), action(label("y", lit("b")), "return y")), "return x")
        )
      ),
      quiet
    );
    expect(program.actions).toEqual([
      { code: "return x", params: [1] },
      { code: "return y", params: [1, 2] },
    ]);
  });

  it("passes the labels seen so far to predicates", () => {
    const program = generateProgram(
      grammar(rule("A", seq(label("x", lit("a")), pred("return x === 'a'", true)))),
      quiet
    );
    expect(program.predicates).toEqual([{ code: "return x === 'a'", params: [1] }]);
    expect(ops(program).slice(-4, -1)).toEqual([["CallB", 0], ["NotF"], ["RestoreIfF"]]);
  });

  it("builds class matchers from their pattern", () => {
    const program = generateProgram(grammar(rule("A", seq(cls("[a-c_]i"), cls("[a-c_]i")))), quiet);
    expect(program.matchers).toEqual([
      {
        kind: "charClass",
        pattern: "[a-c_]i",
        chars: ["_"],
        ranges: [["a", "c"]],
        inverted: false,
        ignoreCase: true,
      },
    ]);
  });

  it("keeps the init block", () => {
    const program = generateProgram(withInit(grammar(rule("A", lit("a"))), "return {};"), quiet);
    expect(program.init).toBe("return {};");
  });

  it("produces well-formed frozen programs", () => {
    const program = generateProgram(
      readGrammar(`
        List = head:Item tail:("," Item)* { return [head, ...tail]; }
        Item "item" = [a-z]+ / &{ return true; } "?"
      `),
      quiet
    );
    expect(checkProgram(program)).toEqual([]);
    expect(Object.isFrozen(program)).toBe(true);
    expect(Object.isFrozen(program.instrs)).toBe(true);
    expect(Object.isFrozen(program.matchers)).toBe(true);
  });

  it("logs each rule and a summary when verbose", () => {
    const lines: string[] = [];
    const logger = createLogger("generator", { verbose: true, writer: (line) => lines.push(line) });
    generateProgram(grammar(rule("A", lit("a"), "letter")), { logger });
    expect(lines).toEqual([
      '[pegcode:generator] rule A "letter": 4 instructions at 3',
      "[pegcode:generator] generated 7 instructions, 1 matchers, 2 strings, 0 actions, 0 predicates",
    ]);
  });
});

describe("generateProgram without a logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("does not consult the configuration", () => {
    const resolved = vi.spyOn(config, "resolved");
    const program = generateProgram(grammar(rule("A", lit("a"))));
    expect(program.instrs).toHaveLength(7);
    expect(resolved).not.toHaveBeenCalled();
  });
});

describe("ExpressionCompiler", () => {
  it("numbers labels from zero in every compiler", () => {
    const firstLabelId = (): number => {
      const compiler = new ExpressionCompiler(new TableBuilder(), new Set(["A"]));
      const body = compiler.compileRule(rule("A", star(lit("a"))));
      const marked = body.items.find((item) => item.kind === "mark");
      return marked?.kind === "mark" ? marked.label.id : -1;
    };
    expect(firstLabelId()).toBe(0);
    expect(firstLabelId()).toBe(0);
  });
});

describe("ProgramAssembler", () => {
  it("enforces the state order", () => {
    const assembler = new ProgramAssembler(grammar(rule("A", lit("a"))), quiet);
    expect(assembler.currentState).toBe("Empty");
    expect(() => assembler.resolveAddresses()).toThrow(AssemblyError);
    expect(() => assembler.resolveAddresses()).toThrow("Assembler is Empty, expected RulesCompiled");
    assembler.validate().compileRules();
    expect(assembler.currentState).toBe("RulesCompiled");
  });

  it("stays Empty when validation fails", () => {
    const assembler = new ProgramAssembler(grammar(), quiet);
    expect(() => assembler.validate()).toThrow(NoRuleError);
    expect(assembler.currentState).toBe("Empty");
  });
});
