import { PegcodeError, ErrorCode, lineCol } from "@pegcode/core";

/** Descriptive grammar-text error with position context. */
export class GrammarSyntaxError extends PegcodeError {
  /** Zero-based position in the source where reading failed. */
  readonly pos: number;
  readonly line: number;
  readonly col: number;
  /** What the reader expected at the failure position. */
  readonly expected: string;

  constructor(source: string, pos: number, expected: string) {
    const { line, col } = lineCol(source, pos);
    const snippet = source.slice(Math.max(0, pos - 10), pos + 20);
    super(
      ErrorCode.GrammarSyntax,
      `Grammar syntax error at line ${line}, col ${col}: expected ${expected}\n  ...${snippet}...`
    );
    this.pos = pos;
    this.line = line;
    this.col = col;
    this.expected = expected;
  }
}
