/**
 * Programmatic grammar construction.
 *
 * @example
 * ```typescript
 * const g = grammar(
 *   rule("Sum", action(seq(label("a", ref("Num")), lit("+"), label("b", ref("Num"))), "return a + b;")),
 *   rule("Num", action(plus(cls("[0-9]")), "return Number(this.text);")),
 * );
 * ```
 */

import type { Expression, Grammar, Rule } from "./types.js";

export function lit(value: string, ignoreCase = false): Expression {
  return { type: "literal", value, ignoreCase };
}

export function cls(pattern: string): Expression {
  return { type: "charClass", pattern };
}

export function any(): Expression {
  return { type: "any" };
}

export function seq(...items: Expression[]): Expression {
  return { type: "sequence", items };
}

export function choice(...alternatives: Expression[]): Expression {
  return { type: "choice", alternatives };
}

export function star(expr: Expression): Expression {
  return { type: "zeroOrMore", expr };
}

export function plus(expr: Expression): Expression {
  return { type: "oneOrMore", expr };
}

export function opt(expr: Expression): Expression {
  return { type: "optional", expr };
}

export function and(expr: Expression): Expression {
  return { type: "and", expr };
}

export function not(expr: Expression): Expression {
  return { type: "not", expr };
}

export function label(name: string, expr: Expression): Expression {
  return { type: "labeled", label: name, expr };
}

export function action(expr: Expression, code: string): Expression {
  return { type: "action", expr, code };
}

export function pred(code: string, negated = false): Expression {
  return { type: "predicate", code, negated };
}

export function ref(name: string): Expression {
  return { type: "ruleRef", name };
}

export function rule(name: string, expr: Expression, displayName?: string): Rule {
  return displayName === undefined ? { name, expr } : { name, displayName, expr };
}

export function grammar(...rules: Rule[]): Grammar {
  return { rules };
}

/** Attach an initializer block to a grammar. */
export function withInit(g: Grammar, init: string): Grammar {
  return { ...g, init };
}
