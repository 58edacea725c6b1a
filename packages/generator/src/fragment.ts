/**
 * Instruction fragments with symbolic operands.
 *
 * Jump targets and rule entries are unknown while an expression is being
 * compiled, so fragments refer to them through `Label` objects and rule
 * names. The assembler lays fragments out and patches both in a second pass.
 */

import { Opcode, StackId } from "@pegcode/bytecode";

/** A jump target, identified by object identity. `id` is only for display. */
export class Label {
  constructor(
    readonly hint: string,
    readonly id: number
  ) {}

  toString(): string {
    return `${this.hint}#${this.id}`;
  }
}

export type Operand =
  | number
  | { readonly kind: "label"; readonly label: Label }
  | { readonly kind: "entry"; readonly rule: string };

export type FragmentItem =
  | { readonly kind: "instr"; readonly op: Opcode; readonly operands: readonly Operand[] }
  | { readonly kind: "mark"; readonly label: Label };

export interface Fragment {
  readonly items: readonly FragmentItem[];
  /** True when a failing run leaves the cursor where it started. */
  readonly restoresOnFailure: boolean;
}

export function instr(op: Opcode, ...operands: Operand[]): FragmentItem {
  return { kind: "instr", op, operands };
}

export function mark(label: Label): FragmentItem {
  return { kind: "mark", label };
}

export function to(label: Label): Operand {
  return { kind: "label", label };
}

export function entryOf(rule: string): Operand {
  return { kind: "entry", rule };
}

export function fragment(restoresOnFailure: boolean, ...parts: Array<FragmentItem | Fragment>): Fragment {
  const items: FragmentItem[] = [];
  for (const part of parts) {
    if ("items" in part) items.push(...part.items);
    else items.push(part);
  }
  return { items, restoresOnFailure };
}

/** Wrap `body` so that failure rewinds the cursor, unless it already does. */
export function guard(body: Fragment): Fragment {
  if (body.restoresOnFailure) return body;
  return fragment(true, instr(Opcode.Push, StackId.Position), body, instr(Opcode.RestoreIfF));
}

/** Number of real instructions in a fragment. */
export function instrCount(frag: Fragment): number {
  return frag.items.reduce((n, item) => (item.kind === "instr" ? n + 1 : n), 0);
}
