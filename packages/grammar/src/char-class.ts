/**
 * Character-class syntax: `[abc]`, `[a-z_]`, `[^0-9]`, `[\t\n ]`, with an
 * optional trailing `i` for case-insensitive matching.
 */

import { GrammarSyntaxError } from "./errors.js";

export interface CharClassSpec {
  /** The class as written, brackets and flag included. */
  readonly pattern: string;
  /** Single code points listed in the class. */
  readonly chars: readonly string[];
  /** Inclusive code point ranges. */
  readonly ranges: ReadonlyArray<readonly [string, string]>;
  readonly inverted: boolean;
  readonly ignoreCase: boolean;
}

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  f: "\f",
  v: "\v",
  b: "\b",
  "0": "\0",
};

/**
 * Read one possibly escaped code point of a class body at `pos`.
 * Returns the character and the position after it.
 */
function readClassChar(pattern: string, pos: number): { ch: string; next: number } {
  const c = pattern.codePointAt(pos);
  if (c === undefined) throw new GrammarSyntaxError(pattern, pos, "']'");
  const ch = String.fromCodePoint(c);
  if (ch !== "\\") return { ch, next: pos + ch.length };

  const esc = pattern[pos + 1];
  if (esc === undefined) throw new GrammarSyntaxError(pattern, pos + 1, "escape sequence");
  if (esc === "u" || esc === "x") {
    const width = esc === "u" ? 4 : 2;
    const hex = pattern.slice(pos + 2, pos + 2 + width);
    if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
      throw new GrammarSyntaxError(pattern, pos + 2, `${width} hex digits`);
    }
    return { ch: String.fromCodePoint(parseInt(hex, 16)), next: pos + 2 + width };
  }
  return { ch: SIMPLE_ESCAPES[esc] ?? esc, next: pos + 2 };
}

/**
 * Parse a character class.
 *
 * @throws GrammarSyntaxError on unterminated classes, bad escapes and
 *   reversed ranges
 */
export function parseCharClass(pattern: string): CharClassSpec {
  if (!pattern.startsWith("[")) throw new GrammarSyntaxError(pattern, 0, "'['");

  let pos = 1;
  const inverted = pattern[pos] === "^";
  if (inverted) pos++;

  const chars: string[] = [];
  const ranges: Array<readonly [string, string]> = [];

  while (pattern[pos] !== "]") {
    const start = pos;
    const from = readClassChar(pattern, pos);
    pos = from.next;
    if (pattern[pos] === "-" && pattern[pos + 1] !== "]" && pattern[pos + 1] !== undefined) {
      const to = readClassChar(pattern, pos + 1);
      if ((to.ch.codePointAt(0) ?? 0) < (from.ch.codePointAt(0) ?? 0)) {
        throw new GrammarSyntaxError(pattern, start, "ascending range");
      }
      ranges.push([from.ch, to.ch]);
      pos = to.next;
    } else {
      chars.push(from.ch);
    }
  }
  pos++; // skip ']'

  const flags = pattern.slice(pos);
  if (flags !== "" && flags !== "i") throw new GrammarSyntaxError(pattern, pos, "end of class");

  return { pattern, chars, ranges, inverted, ignoreCase: flags === "i" };
}
