/**
 * @pegcode/vm
 *
 * Runs compiled programs against input text.
 *
 * @example
 * ```typescript
 * import { readGrammar } from "@pegcode/grammar";
 * import { generateProgram } from "@pegcode/generator";
 * import { createVm } from "@pegcode/vm";
 *
 * const vm = createVm(generateProgram(readGrammar("N = [0-9]+ { return Number(this.text); }")));
 * vm.parse("42"); // → 42
 * ```
 */

export { createVm, type Vm, type VmOptions } from "./vm.js";
export { execute, type RunResult, type LoadedProgram } from "./machine.js";
export { compileMatcher, type MatchFn } from "./matchers.js";
export { compileThunks, type ThunkContext, type ThunkFn, type HostThunks, type CompiledThunks } from "./thunks.js";
export { ParseFailedError, StepLimitError, VmFaultError, type FailureInfo } from "./errors.js";
