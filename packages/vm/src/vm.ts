import { Opcode, checkProgram, decodeInstr, matcherKey, type Program } from "@pegcode/bytecode";
import { config, createLogger, type Logger } from "@pegcode/core";
import { compileMatcher } from "./matchers.js";
import { compileThunks, type HostThunks } from "./thunks.js";
import { execute, type LoadedProgram, type RunResult } from "./machine.js";
import { ParseFailedError, VmFaultError } from "./errors.js";

export interface VmOptions {
  /** Instruction budget per run (default: config `vm.maxSteps`) */
  maxSteps?: number;
  /** Host functions replacing the program's action, predicate and init code */
  thunks?: HostThunks;
  logger?: Logger;
}

export interface Vm {
  /** Run the program against `input`; a partial match counts as success. */
  run(input: string): RunResult;
  /**
   * Run the program and require the whole input to match.
   *
   * @throws ParseFailedError
   */
  parse(input: string): unknown;
}

const END_OF_INPUT = "end of input";

/**
 * Load a program for execution. Matchers and thunks are compiled once;
 * every run gets fresh stacks.
 *
 * @throws VmFaultError when the program is malformed or its code does not compile
 */
export function createVm(program: Program, options: VmOptions = {}): Vm {
  const problems = checkProgram(program);
  if (problems.length > 0) throw new VmFaultError(`Malformed program: ${problems[0]}`);

  const maxSteps = options.maxSteps ?? config.resolved().vm.maxSteps;
  const log = options.logger ?? createLogger("vm");
  const loaded: LoadedProgram = {
    program,
    code: program.instrs.map((words) => decodeInstr(words)),
    matchers: program.matchers.map(compileMatcher),
    keys: program.matchers.map(matcherKey),
    thunks: compileThunks(program, options.thunks),
  };

  const startRule = program.strings.at(program.rules.at(0)?.displayName ?? -1);
  const exitAddress = loaded.code.findIndex((instr) => instr.op === Opcode.Exit);

  function run(input: string): RunResult {
    const result = execute(loaded, input, maxSteps);
    log.debug(
      result.ok
        ? `matched ${result.pos} of ${input.length} characters in ${result.steps} steps`
        : `failed at ${result.pos} in ${result.steps} steps`
    );
    return result;
  }

  function parse(input: string): unknown {
    const result = run(input);
    if (result.ok && result.pos === input.length) return result.value;
    if (!result.ok) throw new ParseFailedError(input, result);

    // Matched a prefix: report the farthest failure when it lies at or past
    // the end of the match, otherwise the leftover input itself.
    const { farthest } = result;
    if (farthest && farthest.pos >= result.pos) {
      const expected =
        farthest.pos === result.pos ? [...farthest.expected, END_OF_INPUT].sort() : farthest.expected;
      throw new ParseFailedError(input, { ...farthest, expected });
    }
    throw new ParseFailedError(input, {
      pos: result.pos,
      expected: [END_OF_INPUT],
      rule: startRule,
      instr: exitAddress,
    });
  }

  return { run, parse };
}
