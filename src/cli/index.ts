/**
 * pegcode CLI
 *
 * Usage:
 *   pegcode compile <grammar> [--out file] [--format json|module] [--verbose]
 *   pegcode dump <grammar> [--verbose]
 *   pegcode parse <grammar> <input> [--verbose]
 *
 * `<grammar>` is grammar text, or a program written by `compile --format json`
 * when the file name ends in `.json`.
 */

import * as fs from "fs";
import { config, createLogger, isPegcodeError, type EmitFormat, type Logger } from "@pegcode/core";
import { readGrammar } from "@pegcode/grammar";
import { generateProgram } from "@pegcode/generator";
import { disassemble, type Program } from "@pegcode/bytecode";
import { createVm } from "@pegcode/vm";
import { emitJson, emitModule, loadProgram } from "../emit/index.js";

export type Command = "compile" | "dump" | "parse";

export interface CliOptions {
  command: Command;
  grammarFile: string;
  inputFile?: string;
  out?: string;
  format?: EmitFormat;
  verbose: boolean;
}

/** File and stream access, replaceable for tests. */
export interface CliIo {
  readFile(path: string): string;
  writeFile(path: string, data: string): void;
  stdout(text: string): void;
  stderr(line: string): void;
}

export const nodeIo: CliIo = {
  readFile: (path) => fs.readFileSync(path, "utf8"),
  writeFile: (path, data) => fs.writeFileSync(path, data),
  stdout: (text) => process.stdout.write(text.endsWith("\n") ? text : `${text}\n`),
  stderr: (line) => console.error(line),
};

const USAGE = `
pegcode - PEG grammar to bytecode compiler

USAGE:
  pegcode <command> <grammar> [input] [options]

COMMANDS:
  compile  Compile a grammar and print (or write) the program
  dump     Print the disassembled program
  parse    Run the program on an input file and print the result as JSON

OPTIONS:
  -o, --out <file>        Write the compiled program to a file (compile)
  -f, --format <format>   json | module (default: config emit.format)
  -v, --verbose           Enable verbose logging
  -h, --help              Show this help message
`.trim();

class UsageError extends Error {}

function isCommand(value: string | undefined): value is Command {
  return value === "compile" || value === "dump" || value === "parse";
}

export function parseArgs(args: readonly string[]): CliOptions | "help" {
  if (args.includes("--help") || args.includes("-h")) return "help";

  const command = args[0];
  if (!isCommand(command)) throw new UsageError(`Unknown command: ${command ?? "(none)"}`);

  const positional: string[] = [];
  let out: string | undefined;
  let format: EmitFormat | undefined;
  let verbose = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out" || arg === "-o") {
      out = args[++i];
      if (out === undefined) throw new UsageError(`${arg} needs a file name`);
    } else if (arg === "--format" || arg === "-f") {
      const value = args[++i];
      if (value !== "json" && value !== "module") throw new UsageError(`${arg} takes json or module`);
      format = value;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const [grammarFile, inputFile, ...extra] = positional;
  if (grammarFile === undefined) throw new UsageError(`${command} needs a grammar file`);
  if (command === "parse" && inputFile === undefined) throw new UsageError("parse needs an input file");
  if (extra.length > 0 || (command !== "parse" && inputFile !== undefined)) {
    throw new UsageError(`Unexpected argument: ${command === "parse" ? extra[0] : inputFile}`);
  }

  return { command, grammarFile, inputFile, out, format, verbose };
}

function loadGrammarProgram(options: CliOptions, io: CliIo, verbose: boolean, log: Logger): Program {
  const source = io.readFile(options.grammarFile);
  if (options.grammarFile.endsWith(".json")) {
    log.debug(`loading compiled program ${options.grammarFile}`);
    return loadProgram(source);
  }
  const logger = createLogger("generator", { verbose, writer: io.stderr });
  return generateProgram(readGrammar(source), { logger });
}

function execute(options: CliOptions, io: CliIo, verbose: boolean, log: Logger): void {
  const program = loadGrammarProgram(options, io, verbose, log);

  switch (options.command) {
    case "compile": {
      const format = options.format ?? config.resolved().emit.format;
      const text = format === "module" ? emitModule(program) : emitJson(program);
      if (options.out === undefined) {
        io.stdout(text);
      } else {
        io.writeFile(options.out, text);
        log.info(`wrote ${options.out} (${program.instrs.length} instructions)`);
      }
      return;
    }

    case "dump":
      io.stdout(disassemble(program));
      return;

    case "parse": {
      if (options.inputFile === undefined) throw new UsageError("parse needs an input file");
      const vm = createVm(program, { logger: createLogger("vm", { verbose, writer: io.stderr }) });
      const value = vm.parse(io.readFile(options.inputFile));
      io.stdout(JSON.stringify(value, null, 2) ?? String(value));
      return;
    }
  }
}

function isMissingFile(error: unknown): error is Error & { path?: string } {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Run the CLI and return its exit code: 0 on success, 1 on bad input,
 * 2 on usage errors and internal faults.
 */
export function runCli(args: readonly string[], io: CliIo = nodeIo): number {
  let options: CliOptions | "help";
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${error.message}\n\n${USAGE}`);
    return 2;
  }
  if (options === "help") {
    io.stdout(USAGE);
    return 0;
  }

  const verbose = options.verbose || config.resolved().verbose;
  const log = createLogger("cli", { verbose, writer: io.stderr });
  const configFile = config.getConfigFilePath();
  if (configFile !== undefined) log.debug(`using config ${configFile}`);

  try {
    execute(options, io, verbose, log);
    return 0;
  } catch (error) {
    if (isPegcodeError(error)) {
      log.error(`${error.code} ${error.message}`);
      return error.internal ? 2 : 1;
    }
    if (isMissingFile(error)) {
      log.error(`cannot read ${error.path ?? "file"}`);
      return 1;
    }
    throw error;
  }
}
