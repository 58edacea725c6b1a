/**
 * @pegcode/grammar
 *
 * The grammar AST consumed by the generator, plus two ways to build it:
 * programmatic builders and a reader for PEG grammar text.
 *
 * @module
 */

export type { Expression, ExpressionType, ExpressionOf, Rule, Grammar } from "./types.js";

export {
  lit,
  cls,
  any,
  seq,
  choice,
  star,
  plus,
  opt,
  and,
  not,
  label,
  action,
  pred,
  ref,
  rule,
  grammar,
  withInit,
} from "./builders.js";

export { parseCharClass, type CharClassSpec } from "./char-class.js";

export { readGrammar } from "./reader.js";

export { GrammarSyntaxError } from "./errors.js";
