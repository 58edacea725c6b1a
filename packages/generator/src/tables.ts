/**
 * Program tables under construction.
 *
 * Matchers and strings are deduplicated by structural key; thunks are not.
 * Indices are handed out sequentially and never reused, so an index stays
 * valid for the rest of the compilation.
 */

import { matcherKey, type Matcher, type ThunkInfo } from "@pegcode/bytecode";

export interface TableEntries {
  matchers: Matcher;
  strings: string;
  actions: ThunkInfo;
  predicates: ThunkInfo;
}

export type TableKind = keyof TableEntries;
export type ThunkKind = "actions" | "predicates";

class Table<T> {
  private readonly entries: T[] = [];
  private readonly index = new Map<string, number>();

  constructor(private readonly keyOf?: (entry: T) => string) {}

  insert(entry: T): number {
    const key = this.keyOf?.(entry);
    if (key !== undefined) {
      const existing = this.index.get(key);
      if (existing !== undefined) return existing;
      this.index.set(key, this.entries.length);
    }
    this.entries.push(entry);
    return this.entries.length - 1;
  }

  get(i: number): T | undefined {
    return this.entries.at(i);
  }

  replace(i: number, entry: T): void {
    if (i < 0 || i >= this.entries.length) throw new RangeError(`No table entry ${i}`);
    this.entries[i] = entry;
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): readonly T[] {
    return Object.freeze([...this.entries]);
  }
}

export interface BuiltTables {
  readonly matchers: readonly Matcher[];
  readonly strings: readonly string[];
  readonly actions: readonly ThunkInfo[];
  readonly predicates: readonly ThunkInfo[];
}

export class TableBuilder {
  private readonly tables: { [K in TableKind]: Table<TableEntries[K]> } = {
    matchers: new Table<Matcher>(matcherKey),
    strings: new Table<string>((s) => s),
    actions: new Table<ThunkInfo>(),
    predicates: new Table<ThunkInfo>(),
  };

  /** Add an entry, or return the index of a structurally equal one. */
  insert<K extends TableKind>(kind: K, entry: TableEntries[K]): number {
    return this.tables[kind].insert(entry);
  }

  /** Claim a thunk index before its parameter list is known. */
  reserveThunk(kind: ThunkKind, code: string): number {
    return this.tables[kind].insert({ code, params: [] });
  }

  setThunkParams(kind: ThunkKind, index: number, params: readonly number[]): void {
    const thunk = this.tables[kind].get(index);
    if (!thunk) throw new RangeError(`No ${kind} entry ${index}`);
    this.tables[kind].replace(index, { code: thunk.code, params: Object.freeze([...params]) });
  }

  size(kind: TableKind): number {
    return this.tables[kind].size;
  }

  build(): BuiltTables {
    return {
      matchers: this.tables.matchers.snapshot(),
      strings: this.tables.strings.snapshot(),
      actions: this.tables.actions.snapshot(),
      predicates: this.tables.predicates.snapshot(),
    };
  }
}
