import { PegcodeError, ErrorCode } from "@pegcode/core";

/** A serialized program that cannot be loaded. */
export class ProgramFormatError extends PegcodeError {
  /** Path to the offending field, e.g. `matchers[2].kind`; empty for the whole document. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(ErrorCode.ProgramFormat, field === "" ? message : `${field}: ${message}`);
    this.field = field;
  }
}
