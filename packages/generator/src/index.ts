/**
 * @pegcode/generator
 *
 * Compiles a grammar AST into a bytecode program.
 *
 * @example
 * ```typescript
 * import { readGrammar } from "@pegcode/grammar";
 * import { generateProgram } from "@pegcode/generator";
 *
 * const program = generateProgram(readGrammar("A = 'a'"));
 * program.instrs.length; // → 7
 * ```
 */

export { generateProgram, ProgramAssembler, type GenerateOptions, type AssemblerState } from "./assembler.js";
export { ExpressionCompiler, matcherFor } from "./compile-expr.js";
export {
  Label,
  guard,
  fragment,
  instr,
  mark,
  to,
  entryOf,
  instrCount,
  type Fragment,
  type FragmentItem,
  type Operand,
} from "./fragment.js";
export { TableBuilder, type TableEntries, type TableKind, type ThunkKind, type BuiltTables } from "./tables.js";
export { NoRuleError, UndefinedRuleError, AssemblyError } from "./errors.js";
