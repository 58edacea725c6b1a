/**
 * Error base class and error catalog.
 *
 * Codes are grouped by origin:
 * - 1xxx grammar semantics (generator input)
 * - 2xxx bytecode encoding and assembly (internal faults)
 * - 3xxx grammar text
 * - 4xxx program execution
 * - 5xxx serialized programs
 * - 6xxx configuration
 */

export const ErrorCode = {
  NoRule: "PEG1001",
  UndefinedRule: "PEG1002",
  EncodingArity: "PEG2001",
  EncodingOperand: "PEG2002",
  Decoding: "PEG2003",
  Assembly: "PEG2004",
  GrammarSyntax: "PEG3001",
  ParseFailed: "PEG4001",
  StepLimit: "PEG4002",
  VmFault: "PEG4003",
  ProgramFormat: "PEG5001",
  Config: "PEG6001",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Errors that indicate a defect in pegcode rather than bad input. */
const INTERNAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.EncodingArity,
  ErrorCode.EncodingOperand,
  ErrorCode.Assembly,
]);

export class PegcodeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  /** True when the error points at a compiler defect, not at user input. */
  get internal(): boolean {
    return INTERNAL_CODES.has(this.code);
  }
}

/** A config file was found but does not hold a usable configuration. */
export class ConfigError extends PegcodeError {
  constructor(
    readonly filepath: string,
    detail: string
  ) {
    super(ErrorCode.Config, `Config in ${filepath} ${detail}`);
  }
}

export function isPegcodeError(error: unknown): error is PegcodeError {
  return error instanceof PegcodeError;
}

/** Convert a zero-based offset to 1-based line/col. */
export function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}
