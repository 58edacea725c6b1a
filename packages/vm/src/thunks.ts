/**
 * Semantic actions, predicates and the init block as callable functions.
 *
 * Grammar code is compiled with `new Function`, taking its labels as
 * parameters in the order listed by the program. Hosts that cannot or will
 * not evaluate code supply the functions themselves.
 */

import type { Program, ThunkInfo } from "@pegcode/bytecode";
import { VmFaultError } from "./errors.js";

/** `this` inside grammar code. */
export interface ThunkContext {
  /** Input covered by the action; empty for predicates and init. */
  readonly text: string;
  /** Position where `text` starts. */
  readonly offset: number;
  /** Value returned by the init block. */
  readonly state: unknown;
}

export type ThunkFn = (this: ThunkContext, ...labels: unknown[]) => unknown;

export interface HostThunks {
  readonly actions?: readonly ThunkFn[];
  readonly predicates?: readonly ThunkFn[];
  readonly init?: (this: ThunkContext) => unknown;
}

export interface CompiledThunks {
  readonly actions: readonly ThunkFn[];
  readonly predicates: readonly ThunkFn[];
  readonly init: ((this: ThunkContext) => unknown) | undefined;
}

function compileCode(what: string, params: readonly string[], code: string): ThunkFn {
  let fn: Function;
  try {
    fn = new Function(...params, code);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new VmFaultError(`${what} does not compile: ${reason}`);
  }
  return function (this: ThunkContext, ...labels: unknown[]): unknown {
    return Reflect.apply(fn, this, labels);
  };
}

function compileTable(
  program: Program,
  kind: "action" | "predicate",
  table: readonly ThunkInfo[],
  host: readonly ThunkFn[] | undefined
): readonly ThunkFn[] {
  if (host) {
    if (host.length < table.length) {
      throw new VmFaultError(`Program has ${table.length} ${kind}s, host supplies ${host.length}`);
    }
    return host;
  }
  return table.map((thunk, i) => {
    const names = thunk.params.map((p) => program.strings.at(p) ?? `$${p}`);
    return compileCode(`${kind} ${i}`, names, thunk.code);
  });
}

export function compileThunks(program: Program, host: HostThunks = {}): CompiledThunks {
  const init =
    host.init ?? (program.init.trim() === "" ? undefined : compileCode("init block", [], program.init));
  return {
    actions: compileTable(program, "action", program.actions, host.actions),
    predicates: compileTable(program, "predicate", program.predicates, host.predicates),
    init,
  };
}
