/**
 * Program serialization.
 *
 * The document keeps every table as written and packs the instructions into
 * one word array; headers carry their operand counts, so no instruction
 * boundaries need to be stored.
 */

import {
  DecodingError,
  checkProgram,
  flattenInstrs,
  unflattenInstrs,
  type Matcher,
  type Program,
  type RuleInfo,
  type ThunkInfo,
} from "@pegcode/bytecode";
import { ProgramFormatError } from "./errors.js";

export const PROGRAM_FORMAT = "pegcode-program";
export const PROGRAM_FORMAT_VERSION = 1;

export interface ProgramDocument {
  readonly format: typeof PROGRAM_FORMAT;
  readonly version: typeof PROGRAM_FORMAT_VERSION;
  readonly init: string;
  readonly words: readonly number[];
  readonly matchers: readonly Matcher[];
  readonly strings: readonly string[];
  readonly actions: readonly ThunkInfo[];
  readonly predicates: readonly ThunkInfo[];
  readonly instrToRule: readonly number[];
  readonly rules: readonly RuleInfo[];
}

export function toDocument(program: Program): ProgramDocument {
  return {
    format: PROGRAM_FORMAT,
    version: PROGRAM_FORMAT_VERSION,
    init: program.init,
    words: Array.from(flattenInstrs(program.instrs)),
    matchers: program.matchers,
    strings: program.strings,
    actions: program.actions,
    predicates: program.predicates,
    instrToRule: program.instrToRule,
    rules: program.rules,
  };
}

export function emitJson(program: Program): string {
  return JSON.stringify(toDocument(program), null, 2);
}

/** An ES module whose default export is the program document. */
export function emitModule(program: Program): string {
  return `// Generated by pegcode. Load with loadProgram().\nexport default ${emitJson(program)};\n`;
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(doc: Record<string, unknown>, name: string, path = name): unknown {
  if (!(name in doc)) throw new ProgramFormatError(path, "missing");
  return doc[name];
}

function arrayOf<T>(value: unknown, path: string, item: (v: unknown, path: string) => T): T[] {
  if (!Array.isArray(value)) throw new ProgramFormatError(path, "expected an array");
  return value.map((v, i) => item(v, `${path}[${i}]`));
}

function integer(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ProgramFormatError(path, "expected an integer");
  }
  return value;
}

function string(value: unknown, path: string): string {
  if (typeof value !== "string") throw new ProgramFormatError(path, "expected a string");
  return value;
}

function boolean(value: unknown, path: string): boolean {
  if (typeof value !== "boolean") throw new ProgramFormatError(path, "expected a boolean");
  return value;
}

function record(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new ProgramFormatError(path, "expected an object");
  return value;
}

function range(value: unknown, path: string): readonly [string, string] {
  const pair = arrayOf(value, path, string);
  if (pair.length !== 2) throw new ProgramFormatError(path, "expected a [from, to] pair");
  return [pair[0], pair[1]];
}

function matcher(value: unknown, path: string): Matcher {
  const m = record(value, path);
  const kind = field(m, "kind", `${path}.kind`);
  switch (kind) {
    case "literal":
      return {
        kind: "literal",
        value: string(field(m, "value", `${path}.value`), `${path}.value`),
        ignoreCase: boolean(field(m, "ignoreCase", `${path}.ignoreCase`), `${path}.ignoreCase`),
      };
    case "charClass":
      return {
        kind: "charClass",
        pattern: string(field(m, "pattern", `${path}.pattern`), `${path}.pattern`),
        chars: arrayOf(field(m, "chars", `${path}.chars`), `${path}.chars`, string),
        ranges: arrayOf(field(m, "ranges", `${path}.ranges`), `${path}.ranges`, range),
        inverted: boolean(field(m, "inverted", `${path}.inverted`), `${path}.inverted`),
        ignoreCase: boolean(field(m, "ignoreCase", `${path}.ignoreCase`), `${path}.ignoreCase`),
      };
    case "any":
      return { kind: "any" };
    default:
      throw new ProgramFormatError(`${path}.kind`, `unknown matcher kind ${JSON.stringify(kind)}`);
  }
}

function thunk(value: unknown, path: string): ThunkInfo {
  const t = record(value, path);
  return {
    code: string(field(t, "code", `${path}.code`), `${path}.code`),
    params: arrayOf(field(t, "params", `${path}.params`), `${path}.params`, integer),
  };
}

function ruleInfo(value: unknown, path: string): RuleInfo {
  const r = record(value, path);
  return {
    name: integer(field(r, "name", `${path}.name`), `${path}.name`),
    displayName: integer(field(r, "displayName", `${path}.displayName`), `${path}.displayName`),
    entry: integer(field(r, "entry", `${path}.entry`), `${path}.entry`),
  };
}

/**
 * Rebuild a program from `emitJson` output, or from the parsed document.
 *
 * @throws ProgramFormatError when the document has the wrong shape, an
 *   unsupported version, undecodable words or out-of-range table references
 */
export function loadProgram(source: unknown): Program {
  let parsed: unknown = source;
  if (typeof source === "string") {
    try {
      parsed = JSON.parse(source);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProgramFormatError("", `not JSON: ${reason}`);
    }
  }

  const doc = record(parsed, "");
  if (doc.format !== PROGRAM_FORMAT) throw new ProgramFormatError("format", `expected "${PROGRAM_FORMAT}"`);
  if (doc.version !== PROGRAM_FORMAT_VERSION) {
    throw new ProgramFormatError("version", `unsupported version ${JSON.stringify(doc.version)}`);
  }

  let instrs: number[][];
  try {
    instrs = unflattenInstrs(arrayOf(field(doc, "words"), "words", integer));
  } catch (error) {
    if (error instanceof DecodingError) throw new ProgramFormatError("words", error.message);
    throw error;
  }

  const program: Program = {
    init: string(field(doc, "init"), "init"),
    instrs,
    matchers: arrayOf(field(doc, "matchers"), "matchers", matcher),
    strings: arrayOf(field(doc, "strings"), "strings", string),
    actions: arrayOf(field(doc, "actions"), "actions", thunk),
    predicates: arrayOf(field(doc, "predicates"), "predicates", thunk),
    instrToRule: arrayOf(field(doc, "instrToRule"), "instrToRule", integer),
    rules: arrayOf(field(doc, "rules"), "rules", ruleInfo),
  };

  const problems = checkProgram(program);
  if (problems.length > 0) throw new ProgramFormatError("", problems[0]);
  return Object.freeze(program);
}
