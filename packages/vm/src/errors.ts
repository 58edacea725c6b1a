import { PegcodeError, ErrorCode, lineCol } from "@pegcode/core";

/** Where and why a run stopped matching. */
export interface FailureInfo {
  /** Farthest input position at which matching failed. */
  readonly pos: number;
  /** Sorted distinct descriptions of what would have matched there. */
  readonly expected: readonly string[];
  /** Display name of the rule owning `instr`. */
  readonly rule: string | undefined;
  /** Address of the instruction that failed at `pos`. */
  readonly instr: number;
}

export class ParseFailedError extends PegcodeError implements FailureInfo {
  readonly pos: number;
  readonly line: number;
  readonly col: number;
  readonly expected: readonly string[];
  readonly rule: string | undefined;
  readonly instr: number;

  constructor(input: string, failure: FailureInfo) {
    const { line, col } = lineCol(input, failure.pos);
    const expected = failure.expected.length > 0 ? `: expected ${failure.expected.join(", ")}` : "";
    super(
      ErrorCode.ParseFailed,
      `rule ${failure.rule ?? "-"} failed at instruction ${failure.instr}${expected} at line ${line}, col ${col}`
    );
    this.pos = failure.pos;
    this.line = line;
    this.col = col;
    this.expected = failure.expected;
    this.rule = failure.rule;
    this.instr = failure.instr;
  }
}

export class StepLimitError extends PegcodeError {
  readonly maxSteps: number;

  constructor(maxSteps: number) {
    super(ErrorCode.StepLimit, `Execution exceeded ${maxSteps} steps`);
    this.maxSteps = maxSteps;
  }
}

/** The program asked for something impossible: a stack underflow, a bad address. */
export class VmFaultError extends PegcodeError {
  /** Address of the faulting instruction, or -1 outside execution. */
  readonly instr: number;

  constructor(message: string, instr = -1) {
    super(ErrorCode.VmFault, instr >= 0 ? `${message} at instruction ${instr}` : message);
    this.instr = instr;
  }
}
