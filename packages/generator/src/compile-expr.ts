/**
 * Lowers grammar expressions into instruction fragments.
 *
 * Every fragment leaves the fail flag set on failure and clear on success.
 * Fragments that rewind the cursor when they fail say so through
 * `restoresOnFailure`, which lets `guard` skip a redundant save/restore pair.
 */

import type { Expression, ExpressionOf, Rule } from "@pegcode/grammar";
import { parseCharClass } from "@pegcode/grammar";
import { Opcode, StackId, type Matcher } from "@pegcode/bytecode";
import { Label, entryOf, fragment, guard, instr, mark, to, type Fragment } from "./fragment.js";
import type { TableBuilder } from "./tables.js";
import { AssemblyError, UndefinedRuleError } from "./errors.js";

type MatchExpression = ExpressionOf<"literal" | "charClass" | "any">;

export function matcherFor(expr: MatchExpression): Matcher {
  switch (expr.type) {
    case "literal":
      return { kind: "literal", value: expr.value, ignoreCase: expr.ignoreCase };
    case "charClass": {
      const spec = parseCharClass(expr.pattern);
      return {
        kind: "charClass",
        pattern: spec.pattern,
        chars: spec.chars,
        ranges: spec.ranges,
        inverted: spec.inverted,
        ignoreCase: spec.ignoreCase,
      };
    }
    case "any":
      return { kind: "any" };
  }
}

const pushPos = () => instr(Opcode.Push, StackId.Position);

export class ExpressionCompiler {
  /** Label names per open scope; the rule body is the outermost scope. */
  private scopes: string[][] = [];
  private ruleName = "";
  private labelCount = 0;

  constructor(
    private readonly tables: TableBuilder,
    private readonly ruleNames: ReadonlySet<string>
  ) {}

  /** `guard(body) Return`, with a fresh label scope. */
  compileRule(rule: Rule): Fragment {
    this.scopes = [[]];
    this.ruleName = rule.name;
    const body = this.compile(rule.expr);
    return fragment(true, guard(body), instr(Opcode.Return));
  }

  compile(expr: Expression): Fragment {
    switch (expr.type) {
      case "literal":
      case "charClass":
      case "any":
        return fragment(
          true,
          pushPos(),
          instr(Opcode.Match, this.tables.insert("matchers", matcherFor(expr))),
          instr(Opcode.RestoreIfF)
        );

      case "sequence":
        return this.sequence(expr.items);

      case "choice":
        return this.choice(expr.alternatives);

      case "zeroOrMore": {
        const loop = this.newLabel("star");
        return fragment(
          true,
          mark(loop),
          guard(this.compile(expr.expr)),
          instr(Opcode.JumpIfNotF, to(loop)),
          instr(Opcode.ClearF)
        );
      }

      case "oneOrMore": {
        // The call-stack slot counts whether any iteration succeeded.
        const loop = this.newLabel("plus");
        const done = this.newLabel("plus.done");
        return fragment(
          true,
          instr(Opcode.Push, StackId.Call, 0),
          mark(loop),
          guard(this.compile(expr.expr)),
          instr(Opcode.JumpIfF, to(done)),
          instr(Opcode.Pop, StackId.Call),
          instr(Opcode.Push, StackId.Call, 1),
          instr(Opcode.Jump, to(loop)),
          mark(done),
          instr(Opcode.PopF)
        );
      }

      case "optional":
        return fragment(true, guard(this.compile(expr.expr)), instr(Opcode.ClearF));

      case "and":
      case "not": {
        const child = this.compile(expr.expr);
        return fragment(
          true,
          pushPos(),
          child,
          instr(Opcode.Restore),
          ...(expr.type === "not" ? [instr(Opcode.NotF)] : [])
        );
      }

      case "labeled": {
        const name = this.tables.insert("strings", expr.label);
        const child = this.compile(expr.expr);
        this.currentScope().push(expr.label);
        return fragment(child.restoresOnFailure, pushPos(), child, instr(Opcode.StoreIfT, name));
      }

      case "action":
        return this.action(expr);

      case "predicate": {
        const index = this.tables.insert("predicates", {
          code: expr.code,
          params: this.paramIndices(this.visibleLabels()),
        });
        return fragment(
          true,
          instr(Opcode.CallB, index),
          ...(expr.negated ? [instr(Opcode.NotF)] : [])
        );
      }

      case "ruleRef":
        if (!this.ruleNames.has(expr.name)) {
          throw new UndefinedRuleError(expr.name, this.ruleName);
        }
        return fragment(true, instr(Opcode.Push, StackId.Call, entryOf(expr.name)), instr(Opcode.Call));
    }
  }

  private sequence(items: readonly Expression[]): Fragment {
    if (items.length === 0) return fragment(true, instr(Opcode.ClearF));
    if (items.length === 1) return this.compile(items[0]);

    const exit = this.newLabel("seq.exit");
    const parts: Fragment[] = items.map((item, i) => {
      const child = this.compile(item);
      return i < items.length - 1 ? fragment(false, child, instr(Opcode.JumpIfF, to(exit))) : child;
    });
    return fragment(false, ...parts, mark(exit));
  }

  private choice(alternatives: readonly Expression[]): Fragment {
    // No alternative can match: set the flag.
    if (alternatives.length === 0) return fragment(true, instr(Opcode.ClearF), instr(Opcode.NotF));

    const exit = this.newLabel("choice.exit");
    const parts: Fragment[] = [];
    let last: Fragment = fragment(true);
    alternatives.forEach((alt, i) => {
      const child = this.compile(alt);
      if (i < alternatives.length - 1) {
        parts.push(guard(child), fragment(true, instr(Opcode.JumpIfNotF, to(exit))));
      } else {
        last = child;
      }
    });
    return fragment(last.restoresOnFailure, ...parts, last, mark(exit));
  }

  private action(expr: ExpressionOf<"action">): Fragment {
    // Reserved first so nested actions get later indices.
    const index = this.tables.reserveThunk("actions", expr.code);
    const outer = this.visibleLabels();

    this.scopes.push([]);
    const child = this.compile(expr.expr);
    const inner = this.scopes.pop() ?? [];
    this.tables.setThunkParams("actions", index, this.paramIndices([...outer, ...inner]));

    const skip = this.newLabel("action.skip");
    return fragment(
      child.restoresOnFailure,
      pushPos(),
      child,
      instr(Opcode.JumpIfF, to(skip)),
      instr(Opcode.CallA, index),
      mark(skip),
      instr(Opcode.Pop, StackId.Position)
    );
  }

  private newLabel(hint: string): Label {
    return new Label(hint, this.labelCount++);
  }

  private currentScope(): string[] {
    const scope = this.scopes.at(-1);
    if (!scope) throw new AssemblyError(`No label scope open in rule "${this.ruleName}"`);
    return scope;
  }

  private visibleLabels(): string[] {
    return this.scopes.flat();
  }

  /** String indices of the distinct names, first occurrence first. */
  private paramIndices(names: readonly string[]): number[] {
    return [...new Set(names)].map((name) => this.tables.insert("strings", name));
  }
}
