/**
 * Parser combinators for the grammar-text reader. Alternation is ordered:
 * the first alternative that matches wins.
 */

/** Success with a value and the next position, or the failure position and what was expected there. */
export type ParseResult<T> =
  | { ok: true; value: T; pos: number }
  | { ok: false; pos: number; expected: string };

export interface Parser<T> {
  /** Attempt to parse starting at `pos` (default 0). */
  parse(input: string, pos?: number): ParseResult<T>;
}

/** Wrap a raw parse function. */
export function mkParser<T>(parseFn: (input: string, pos: number) => ParseResult<T>): Parser<T> {
  return {
    parse(input: string, pos = 0): ParseResult<T> {
      return parseFn(input, pos);
    },
  };
}

export function ok<T>(value: T, pos: number): ParseResult<T> {
  return { ok: true, value, pos };
}

export function fail<T>(pos: number, expected: string): ParseResult<T> {
  return { ok: false, pos, expected };
}

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((input, pos) => {
    if (input.startsWith(s, pos)) {
      return ok(s, pos + s.length);
    }
    return fail(pos, JSON.stringify(s));
  });
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp, expected = `/${pattern.source}/`): Parser<string> {
  const anchored = new RegExp(pattern.source, "y");
  return mkParser((input, pos) => {
    anchored.lastIndex = pos;
    const m = anchored.exec(input);
    if (m) {
      return ok(m[0], pos + m[0].length);
    }
    return fail(pos, expected);
  });
}

/** Ordered alternation. When every alternative fails, the one that got farthest is reported. */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return mkParser((input, pos) => {
    let best: ParseResult<T> = fail(pos, "alternative");
    for (const p of parsers) {
      const r = p.parse(input, pos);
      if (r.ok) return r;
      if (r.pos >= best.pos) best = r;
    }
    return best;
  });
}

/** Zero or more repetitions; stops on a failure or an empty match. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((input, pos) => {
    const results: T[] = [];
    let cur = pos;
    for (;;) {
      const r = p.parse(input, cur);
      if (!r.ok) break;
      if (r.pos === cur) break;
      results.push(r.value);
      cur = r.pos;
    }
    return ok(results, cur);
  });
}

export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((input, pos) => {
    const r = p.parse(input, pos);
    if (!r.ok) return fail(r.pos, r.expected);
    return ok(f(r.value), r.pos);
  });
}

/** Defer building a parser until first use, for recursive definitions. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((input, pos) => {
    if (!cached) cached = f();
    return cached.parse(input, pos);
  });
}
