/**
 * pegcode
 *
 * Compiles PEG grammars into bytecode programs for a backtracking virtual
 * machine. This entry point re-exports the workspace packages together with
 * program serialization and the CLI.
 *
 * @example
 * ```typescript
 * import { readGrammar, generateProgram, createVm, emitJson } from "pegcode";
 *
 * const program = generateProgram(readGrammar(`
 *   Sum = left:Num "+" right:Sum { return left + right; } / Num
 *   Num = digits:[0-9]+ { return Number(digits); }
 * `));
 * createVm(program).parse("1+2+3"); // → 6
 * emitJson(program);                // → JSON document
 * ```
 *
 * @packageDocumentation
 */

export * from "@pegcode/core";
export * from "@pegcode/grammar";
export * from "@pegcode/bytecode";
export * from "@pegcode/generator";
export * from "@pegcode/vm";
export * from "./emit/index.js";
export { runCli, parseArgs, nodeIo, type CliIo, type CliOptions, type Command } from "./cli/index.js";
