/**
 * Matcher execution. Each matcher compiles to a function returning the
 * position after the match, or -1.
 */

import type { Matcher } from "@pegcode/bytecode";

export type MatchFn = (input: string, pos: number) => number;

function caseVariants(ch: string): string[] {
  return [...new Set([ch, ch.toLowerCase(), ch.toUpperCase()])];
}

function inClass(ch: string, chars: ReadonlySet<string>, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  if (chars.has(ch)) return true;
  const code = ch.codePointAt(0) ?? -1;
  return ranges.some(([lo, hi]) => code >= lo && code <= hi);
}

export function compileMatcher(matcher: Matcher): MatchFn {
  switch (matcher.kind) {
    case "literal": {
      const { value, ignoreCase } = matcher;
      if (!ignoreCase) {
        return (input, pos) => (input.startsWith(value, pos) ? pos + value.length : -1);
      }
      const lowered = value.toLowerCase();
      return (input, pos) =>
        input.slice(pos, pos + value.length).toLowerCase() === lowered ? pos + value.length : -1;
    }

    case "charClass": {
      const chars = new Set(matcher.chars);
      const ranges = matcher.ranges.map(([lo, hi]): readonly [number, number] => [
        lo.codePointAt(0) ?? 0,
        hi.codePointAt(0) ?? 0,
      ]);
      const { inverted, ignoreCase } = matcher;
      return (input, pos) => {
        const code = input.codePointAt(pos);
        if (code === undefined) return -1;
        const ch = String.fromCodePoint(code);
        const hit = ignoreCase
          ? caseVariants(ch).some((variant) => inClass(variant, chars, ranges))
          : inClass(ch, chars, ranges);
        return hit !== inverted ? pos + ch.length : -1;
      };
    }

    case "any":
      return (input, pos) => {
        const code = input.codePointAt(pos);
        return code === undefined ? -1 : pos + String.fromCodePoint(code).length;
      };
  }
}
