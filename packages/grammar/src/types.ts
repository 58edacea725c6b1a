/**
 * Grammar AST for @pegcode/grammar
 *
 * A grammar is an ordered list of rules; the first rule is the entry point.
 * The AST is produced by `readGrammar` or the builders and is never mutated
 * by the compiler.
 */

/** Grammar expression nodes. */
export type Expression =
  | { readonly type: "literal"; readonly value: string; readonly ignoreCase: boolean }
  | { readonly type: "charClass"; readonly pattern: string }
  | { readonly type: "any" }
  | { readonly type: "sequence"; readonly items: readonly Expression[] }
  | { readonly type: "choice"; readonly alternatives: readonly Expression[] }
  | { readonly type: "zeroOrMore"; readonly expr: Expression }
  | { readonly type: "oneOrMore"; readonly expr: Expression }
  | { readonly type: "optional"; readonly expr: Expression }
  /** Positive lookahead: must match, consumes nothing. */
  | { readonly type: "and"; readonly expr: Expression }
  /** Negative lookahead. */
  | { readonly type: "not"; readonly expr: Expression }
  | { readonly type: "labeled"; readonly label: string; readonly expr: Expression }
  | { readonly type: "action"; readonly expr: Expression; readonly code: string }
  /** Semantic predicate: zero-width, `&{ code }` or `!{ code }` when negated. */
  | { readonly type: "predicate"; readonly code: string; readonly negated: boolean }
  | { readonly type: "ruleRef"; readonly name: string };

export type ExpressionType = Expression["type"];

/** Narrow an expression union member by its `type` tag. */
export type ExpressionOf<K extends ExpressionType> = Extract<Expression, { readonly type: K }>;

export interface Rule {
  readonly name: string;
  /** Human-readable name used in diagnostics; defaults to `name`. */
  readonly displayName?: string;
  readonly expr: Expression;
}

export interface Grammar {
  /** Code run once before parsing begins. */
  readonly init?: string;
  readonly rules: readonly Rule[];
}
