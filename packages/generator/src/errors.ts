import { PegcodeError, ErrorCode } from "@pegcode/core";

/** The grammar declares no rules, so there is no entry point. */
export class NoRuleError extends PegcodeError {
  constructor() {
    super(ErrorCode.NoRule, "Grammar has no rules");
  }
}

export class UndefinedRuleError extends PegcodeError {
  readonly ruleName: string;
  /** Rule whose body holds the reference. */
  readonly referencedFrom: string;

  constructor(ruleName: string, referencedFrom: string) {
    super(ErrorCode.UndefinedRule, `Rule "${referencedFrom}" references undefined rule "${ruleName}"`);
    this.ruleName = ruleName;
    this.referencedFrom = referencedFrom;
  }
}

/** The assembler reached an inconsistent state; always a compiler defect. */
export class AssemblyError extends PegcodeError {
  constructor(message: string) {
    super(ErrorCode.Assembly, message);
  }
}
