import { PegcodeError, ErrorCode } from "@pegcode/core";

/** Base class for instruction encoding faults. */
export class EncodingError extends PegcodeError {}

/** An opcode was given an operand count outside its arity. */
export class EncodingArityError extends EncodingError {
  readonly opcode: string;
  readonly given: number;

  constructor(opcode: string, minArgs: number, maxArgs: number, given: number) {
    const arity = minArgs === maxArgs ? `${minArgs}` : `${minArgs} to ${maxArgs}`;
    super(
      ErrorCode.EncodingArity,
      `${opcode} takes ${arity} operand${maxArgs === 1 ? "" : "s"}, got ${given}`
    );
    this.opcode = opcode;
    this.given = given;
  }
}

/** An operand value cannot be encoded for its position. */
export class EncodingOperandError extends EncodingError {
  constructor(message: string) {
    super(ErrorCode.EncodingOperand, message);
  }
}

/** Words that are not the output of the encoder. */
export class DecodingError extends PegcodeError {
  constructor(message: string) {
    super(ErrorCode.Decoding, message);
  }
}
