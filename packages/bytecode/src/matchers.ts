/** Compiled matcher descriptors referenced by `Match` instructions. */

export type Matcher =
  | { readonly kind: "literal"; readonly value: string; readonly ignoreCase: boolean }
  | {
      readonly kind: "charClass";
      /** The class as written, e.g. `[a-z]i`. */
      readonly pattern: string;
      readonly chars: readonly string[];
      readonly ranges: ReadonlyArray<readonly [string, string]>;
      readonly inverted: boolean;
      readonly ignoreCase: boolean;
    }
  | { readonly kind: "any" };

/**
 * Structural identity of a matcher: the quoted literal with an `i` suffix
 * when case-insensitive, the class pattern, or `.`. Doubles as the
 * human-readable description in diagnostics.
 */
export function matcherKey(matcher: Matcher): string {
  switch (matcher.kind) {
    case "literal":
      return JSON.stringify(matcher.value) + (matcher.ignoreCase ? "i" : "");
    case "charClass":
      return matcher.pattern;
    case "any":
      return ".";
  }
}
