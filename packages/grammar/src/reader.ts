/**
 * Grammar-text reader for @pegcode/grammar
 *
 * Reads PEG grammar source into the `Grammar` AST:
 *
 * - `{ code }` initializer block, before the first rule
 * - `Name = expr`, `Name <- expr` rule definition
 * - `Name "display name" = expr` rule with a display name
 * - `a b c` sequence
 * - `a / b` (or `a | b`) ordered choice
 * - `a*`, `a+`, `a?` repetition and option
 * - `&a`, `!a` lookahead
 * - `&{ code }`, `!{ code }` semantic predicates
 * - `label:a` labeled capture
 * - `a b { code }` action over the preceding sequence
 * - `"lit"`, `'lit'`, `"lit"i` literals, optionally case-insensitive
 * - `[a-z]`, `[^"]`, `[a-z]i` character classes
 * - `.` any character
 * - `(a)` grouping
 * - `// ...`, `/* ... *\/` comments
 */

import type { Expression, Grammar, Rule } from "./types.js";
import { GrammarSyntaxError } from "./errors.js";
import { parseCharClass } from "./char-class.js";
import {
  alt,
  fail,
  lazy,
  literal,
  many,
  map,
  mkParser,
  ok,
  regex,
  type Parser,
} from "./combinators.js";

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

const spacing: Parser<string[]> = many(
  alt(
    regex(/[ \t\r\n]+/, "whitespace"),
    regex(/\/\/[^\n]*/, "comment"),
    regex(/\/\*[\s\S]*?\*\//, "comment")
  )
);

/** Position after any whitespace and comments at `pos`. */
function skip(input: string, pos: number): number {
  const r = spacing.parse(input, pos);
  return r.ok ? r.pos : pos;
}

const identifier: Parser<string> = regex(/[A-Za-z_][A-Za-z0-9_]*/, "identifier");

const caseFlag: Parser<string> = regex(/i(?![A-Za-z0-9_])/, "'i'");

const ruleOperator: Parser<string> = alt(literal("="), literal("<-"), literal("←"));

const STRING_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  f: "\f",
  v: "\v",
  b: "\b",
  "0": "\0",
};

/** Parse a string literal: "..." or '...' */
const stringLit: Parser<string> = mkParser((input, pos) => {
  const q = input[pos];
  if (q !== '"' && q !== "'") return fail(pos, "string literal");
  let i = pos + 1;
  let value = "";
  while (i < input.length && input[i] !== q) {
    const c = input[i];
    if (c === "\n") return fail(i, `closing ${q}`);
    if (c !== "\\") {
      value += c;
      i++;
      continue;
    }
    const esc = input[i + 1];
    if (esc === undefined) return fail(i + 1, "escape sequence");
    if (esc === "u" || esc === "x") {
      const width = esc === "u" ? 4 : 2;
      const hex = input.slice(i + 2, i + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) return fail(i + 2, `${width} hex digits`);
      value += String.fromCodePoint(parseInt(hex, 16));
      i += 2 + width;
      continue;
    }
    value += STRING_ESCAPES[esc] ?? esc;
    i += 2;
  }
  if (i >= input.length) return fail(i, `closing ${q}`);
  return ok(value, i + 1);
});

/** Index just past the quoted string starting at `i` inside a code block. */
function skipQuoted(input: string, i: number): number {
  const q = input[i];
  let j = i + 1;
  while (j < input.length && input[j] !== q) {
    j += input[j] === "\\" ? 2 : 1;
  }
  return j + 1;
}

/** Index just past a `//` or `/* ... *\/` comment starting at `i`, or `i` when there is none. */
function skipCodeComment(input: string, i: number): number {
  if (input.startsWith("//", i)) {
    const end = input.indexOf("\n", i + 2);
    return end < 0 ? input.length : end + 1;
  }
  if (input.startsWith("/*", i)) {
    const end = input.indexOf("*/", i + 2);
    return end < 0 ? input.length : end + 2;
  }
  return i;
}

/** Parse a brace-balanced code block, returning the trimmed body. */
const codeBlock: Parser<string> = mkParser((input, pos) => {
  if (input[pos] !== "{") return fail(pos, "'{'");
  let depth = 0;
  let i = pos;
  while (i < input.length) {
    const c = input[i];
    const afterComment = skipCodeComment(input, i);
    if (afterComment > i) {
      i = afterComment;
      continue;
    }
    if (c === '"' || c === "'" || c === "`") {
      i = skipQuoted(input, i);
      continue;
    }
    if (c === "{") {
      depth++;
    } else if (c === "}") {
      depth--;
      if (depth === 0) return ok(input.slice(pos + 1, i).trim(), i + 1);
    }
    i++;
  }
  return fail(pos, "closing '}'");
});

/** A rule header ahead: `Name "display"? =`. Used to end the previous rule's sequence. */
const ruleStart: Parser<string> = mkParser((input, pos) => {
  const name = identifier.parse(input, pos);
  if (!name.ok) return name;
  let cur = skip(input, name.pos);
  const display = stringLit.parse(input, cur);
  if (display.ok) cur = skip(input, display.pos);
  const op = ruleOperator.parse(input, cur);
  if (!op.ok) return fail(op.pos, op.expected);
  return ok(name.value, op.pos);
});

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

const literalExpr: Parser<Expression> = mkParser((input, pos) => {
  const s = stringLit.parse(input, pos);
  if (!s.ok) return s;
  const flag = caseFlag.parse(input, s.pos);
  return ok<Expression>(
    { type: "literal", value: s.value, ignoreCase: flag.ok },
    flag.ok ? flag.pos : s.pos
  );
});

const charClassExpr: Parser<Expression> = mkParser((input, pos) => {
  if (input[pos] !== "[") return fail(pos, "character class");
  let i = pos + 1;
  while (i < input.length && input[i] !== "]") {
    if (input[i] === "\n") return fail(i, "']'");
    i += input[i] === "\\" ? 2 : 1;
  }
  if (i >= input.length) return fail(i, "']'");
  i++;
  const flag = caseFlag.parse(input, i);
  const end = flag.ok ? flag.pos : i;
  const pattern = input.slice(pos, end);
  try {
    parseCharClass(pattern);
  } catch (error) {
    if (error instanceof GrammarSyntaxError) return fail(pos + error.pos, error.expected);
    throw error;
  }
  return ok<Expression>({ type: "charClass", pattern }, end);
});

const anyExpr: Parser<Expression> = map(literal("."), (): Expression => ({ type: "any" }));

const ruleRefExpr: Parser<Expression> = mkParser((input, pos) => {
  if (ruleStart.parse(input, pos).ok) return fail(pos, "expression");
  const id = identifier.parse(input, pos);
  if (!id.ok) return id;
  return ok<Expression>({ type: "ruleRef", name: id.value }, id.pos);
});

/** Grouped expression: '(' choice ')' */
const groupExpr: Parser<Expression> = lazy(() =>
  mkParser((input, pos) => {
    if (input[pos] !== "(") return fail(pos, "'('");
    const inner = choiceExpr.parse(input, skip(input, pos + 1));
    if (!inner.ok) return inner;
    const closePos = skip(input, inner.pos);
    if (input[closePos] !== ")") return fail(closePos, "')'");
    return ok(inner.value, closePos + 1);
  })
);

/** Primary expression: literal | class | '.' | group | reference */
const primary: Parser<Expression> = alt(literalExpr, charClassExpr, anyExpr, groupExpr, ruleRefExpr);

/** Suffixed: primary ('*' | '+' | '?')? */
const suffixed: Parser<Expression> = mkParser((input, pos) => {
  const p = primary.parse(input, pos);
  if (!p.ok) return p;
  const expr = p.value;
  switch (input[p.pos]) {
    case "*":
      return ok<Expression>({ type: "zeroOrMore", expr }, p.pos + 1);
    case "+":
      return ok<Expression>({ type: "oneOrMore", expr }, p.pos + 1);
    case "?":
      return ok<Expression>({ type: "optional", expr }, p.pos + 1);
    default:
      return p;
  }
});

/**
 * Prefixed: ('&' | '!') (code | suffixed) | suffixed
 * `&{ code }` and `!{ code }` are semantic predicates.
 */
const prefixed: Parser<Expression> = mkParser((input, pos) => {
  const c = input[pos];
  if (c !== "&" && c !== "!") return suffixed.parse(input, pos);

  const code = codeBlock.parse(input, pos + 1);
  if (code.ok) {
    return ok<Expression>({ type: "predicate", code: code.value, negated: c === "!" }, code.pos);
  }
  const expr = suffixed.parse(input, skip(input, pos + 1));
  if (!expr.ok) return expr;
  return ok<Expression>({ type: c === "&" ? "and" : "not", expr: expr.value }, expr.pos);
});

/** Labeled: (identifier ':')? prefixed */
const labeled: Parser<Expression> = mkParser((input, pos) => {
  const id = identifier.parse(input, pos);
  if (id.ok) {
    const colon = skip(input, id.pos);
    if (input[colon] === ":") {
      const expr = prefixed.parse(input, skip(input, colon + 1));
      if (!expr.ok) return expr;
      return ok<Expression>({ type: "labeled", label: id.value, expr: expr.value }, expr.pos);
    }
  }
  return prefixed.parse(input, pos);
});

/** Sequence: labeled+, ending before the next rule header */
const sequence: Parser<Expression> = mkParser((input, pos) => {
  const items: Expression[] = [];
  let cur = pos;
  for (;;) {
    const next = items.length === 0 ? cur : skip(input, cur);
    if (ruleStart.parse(input, next).ok) break;
    const item = labeled.parse(input, next);
    if (!item.ok) {
      // A failure past the item's start is a real syntax error, not the end of the sequence.
      if (items.length === 0 || item.pos > next) return item;
      break;
    }
    items.push(item.value);
    cur = item.pos;
  }
  if (items.length === 0) return fail(pos, "expression");
  if (items.length === 1) return ok(items[0], cur);
  return ok<Expression>({ type: "sequence", items }, cur);
});

/** Action: sequence code? */
const actionExpr: Parser<Expression> = mkParser((input, pos) => {
  const body = sequence.parse(input, pos);
  if (!body.ok) return body;
  const code = codeBlock.parse(input, skip(input, body.pos));
  if (!code.ok) return body;
  return ok<Expression>({ type: "action", expr: body.value, code: code.value }, code.pos);
});

/** Choice: action (('/' | '|') action)* */
const choiceExpr: Parser<Expression> = mkParser((input, pos) => {
  const first = actionExpr.parse(input, pos);
  if (!first.ok) return first;
  const alternatives: Expression[] = [first.value];
  let cur = first.pos;
  for (;;) {
    const sep = skip(input, cur);
    if (input[sep] !== "/" && input[sep] !== "|") break;
    const next = actionExpr.parse(input, skip(input, sep + 1));
    if (!next.ok) return next;
    alternatives.push(next.value);
    cur = next.pos;
  }
  if (alternatives.length === 1) return ok(alternatives[0], cur);
  return ok<Expression>({ type: "choice", alternatives }, cur);
});

const ruleDef: Parser<Rule> = mkParser((input, pos) => {
  const name = identifier.parse(input, pos);
  if (!name.ok) return fail(pos, "rule name");
  let cur = skip(input, name.pos);

  let displayName: string | undefined;
  const display = stringLit.parse(input, cur);
  if (display.ok) {
    displayName = display.value;
    cur = skip(input, display.pos);
  }

  const op = ruleOperator.parse(input, cur);
  if (!op.ok) return fail(cur, `'=' after rule name '${name.value}'`);

  const expr = choiceExpr.parse(input, skip(input, op.pos));
  if (!expr.ok) return fail(expr.pos, expr.expected);

  const rule: Rule =
    displayName === undefined
      ? { name: name.value, expr: expr.value }
      : { name: name.value, displayName, expr: expr.value };
  return ok(rule, expr.pos);
});

// ---------------------------------------------------------------------------
// Top-level grammar reader
// ---------------------------------------------------------------------------

/**
 * Read PEG grammar source into a `Grammar`.
 *
 * An empty source yields a grammar with no rules; rejecting it is left to
 * the generator.
 *
 * @throws GrammarSyntaxError on invalid grammar syntax
 */
export function readGrammar(source: string): Grammar {
  let pos = skip(source, 0);

  let init: string | undefined;
  const initBlock = codeBlock.parse(source, pos);
  if (initBlock.ok) {
    init = initBlock.value;
    pos = skip(source, initBlock.pos);
  } else if (source[pos] === "{") {
    throw new GrammarSyntaxError(source, initBlock.pos, initBlock.expected);
  }

  const rules: Rule[] = [];
  while (pos < source.length) {
    const r = ruleDef.parse(source, pos);
    if (!r.ok) throw new GrammarSyntaxError(source, r.pos, r.expected);
    rules.push(r.value);
    pos = skip(source, r.pos);
  }

  return init === undefined ? { rules } : { init, rules };
}
