/**
 * The execution loop.
 *
 * State: program counter, input cursor, fail flag, a call stack of return
 * addresses and loop counters, a position stack of saved cursors, and one
 * label frame per active rule call. The value register holds the last
 * matched text or action result together with the input span it covers and
 * a write stamp. Each saved cursor records the stamp current when it was
 * pushed, so a capture only takes a value written after its start.
 */

import {
  Opcode,
  StackId,
  ruleNameAt,
  type DecodedInstruction,
  type Program,
} from "@pegcode/bytecode";
import type { MatchFn } from "./matchers.js";
import type { CompiledThunks, ThunkContext } from "./thunks.js";
import { StepLimitError, VmFaultError, type FailureInfo } from "./errors.js";

export type RunResult =
  | {
      readonly ok: true;
      readonly value: unknown;
      readonly pos: number;
      readonly steps: number;
      /** Farthest failure met on the way, if any. */
      readonly farthest: FailureInfo | undefined;
    }
  | ({ readonly ok: false; readonly steps: number } & FailureInfo);

export interface LoadedProgram {
  readonly program: Program;
  readonly code: readonly DecodedInstruction[];
  readonly matchers: readonly MatchFn[];
  readonly keys: readonly string[];
  readonly thunks: CompiledThunks;
}

export function execute(loaded: LoadedProgram, input: string, maxSteps: number): RunResult {
  const { program, code, matchers, keys, thunks } = loaded;

  const stacks: [number[], number[]] = [[], []];
  const positionStamps: number[] = [];
  const frames: Array<Map<number, unknown>> = [];
  let pc = 0;
  let cursor = 0;
  let fail = false;
  let steps = 0;

  let value: unknown = undefined;
  let valueStart = -1;
  let valueEnd = -1;
  let writes = 0;
  let valueStamp = 0;

  let farthest = -1;
  let failedAt = -1;
  const expected = new Set<string>();

  const state = thunks.init ? thunks.init.call({ text: input, offset: 0, state: undefined }) : undefined;

  function noteFailure(pos: number, address: number, key?: string): void {
    if (pos > farthest) {
      farthest = pos;
      failedAt = address;
      expected.clear();
    }
    if (pos === farthest && key !== undefined) expected.add(key);
  }

  function failure(pos: number, address: number): FailureInfo {
    const at = failedAt >= 0 ? failedAt : address;
    return {
      pos: farthest >= 0 ? farthest : pos,
      expected: [...expected].sort(),
      rule: ruleNameAt(program, at),
      instr: at,
    };
  }

  function pop(stack: StackId): number {
    const top = stacks[stack].pop();
    if (top === undefined) throw new VmFaultError(`${StackId[stack]} stack underflow`, pc);
    if (stack === StackId.Position) positionStamps.pop();
    return top;
  }

  function peekPosition(): number {
    const top = stacks[StackId.Position].at(-1);
    if (top === undefined) throw new VmFaultError("Position stack is empty", pc);
    return top;
  }

  function frame(): Map<number, unknown> {
    const top = frames.at(-1);
    if (!top) throw new VmFaultError("No label frame outside a rule", pc);
    return top;
  }

  function jump(address: number): number {
    if (address < 0 || address >= code.length) throw new VmFaultError(`Jump to ${address}`, pc);
    return address;
  }

  function labelValues(params: readonly number[]): unknown[] {
    const bindings = frame();
    return params.map((p) => bindings.get(p));
  }

  for (;;) {
    if (++steps > maxSteps) throw new StepLimitError(maxSteps);
    const instr = code.at(pc);
    if (!instr) throw new VmFaultError(`No instruction at ${pc}`);
    let next = pc + 1;

    switch (instr.op) {
      case Opcode.Push: {
        const stack = stackOf(instr.arg0, pc);
        stacks[stack].push(instr.count === 2 ? instr.arg1 : cursor);
        if (stack === StackId.Position) positionStamps.push(writes);
        break;
      }

      case Opcode.Pop:
        pop(stackOf(instr.arg0, pc));
        break;

      case Opcode.Call:
        next = jump(pop(StackId.Call));
        stacks[StackId.Call].push(pc + 1);
        frames.push(new Map());
        break;

      case Opcode.Return:
        next = jump(pop(StackId.Call));
        frames.pop();
        break;

      case Opcode.Exit:
        if (fail) return { ok: false, steps, ...failure(cursor, pc) };
        return {
          ok: true,
          steps,
          pos: cursor,
          value: valueStart === 0 && valueEnd === cursor ? value : input.slice(0, cursor),
          farthest: farthest >= 0 ? failure(cursor, pc) : undefined,
        };

      case Opcode.Match: {
        const end = matchAt(matchers, instr.arg0, input, cursor, pc);
        if (end < 0) {
          fail = true;
          noteFailure(cursor, pc, keys[instr.arg0]);
        } else {
          value = input.slice(cursor, end);
          valueStart = cursor;
          valueEnd = end;
          valueStamp = ++writes;
          cursor = end;
          fail = false;
        }
        break;
      }

      case Opcode.RestoreIfF: {
        const saved = pop(StackId.Position);
        if (fail) cursor = saved;
        break;
      }

      case Opcode.Restore:
        cursor = pop(StackId.Position);
        break;

      case Opcode.Jump:
        next = jump(instr.arg0);
        break;

      case Opcode.JumpIfF:
        if (fail) next = jump(instr.arg0);
        break;

      case Opcode.JumpIfNotF:
        if (!fail) next = jump(instr.arg0);
        break;

      case Opcode.CallB: {
        const predicate = thunks.predicates.at(instr.arg0);
        const info = program.predicates.at(instr.arg0);
        if (!predicate || !info) throw new VmFaultError(`No predicate ${instr.arg0}`, pc);
        const context: ThunkContext = { text: "", offset: cursor, state };
        fail = !predicate.apply(context, labelValues(info.params));
        if (fail) noteFailure(cursor, pc);
        break;
      }

      case Opcode.CallA: {
        const action = thunks.actions.at(instr.arg0);
        const info = program.actions.at(instr.arg0);
        if (!action || !info) throw new VmFaultError(`No action ${instr.arg0}`, pc);
        const start = peekPosition();
        const context: ThunkContext = { text: input.slice(start, cursor), offset: start, state };
        value = action.apply(context, labelValues(info.params));
        valueStart = start;
        valueEnd = cursor;
        valueStamp = ++writes;
        break;
      }

      case Opcode.ClearF:
        fail = false;
        break;

      case Opcode.NotF:
        fail = !fail;
        break;

      case Opcode.PopF:
        fail = pop(StackId.Call) === 0;
        break;

      case Opcode.StoreIfT: {
        const since = positionStamps.at(-1) ?? writes;
        const start = pop(StackId.Position);
        if (!fail) {
          const fresh = valueStamp > since && valueStart === start && valueEnd === cursor;
          const captured = fresh ? value : input.slice(start, cursor);
          frame().set(instr.arg0, captured);
        }
        break;
      }
    }

    pc = next;
  }
}

function stackOf(id: number, pc: number): StackId {
  if (id === StackId.Call || id === StackId.Position) return id;
  throw new VmFaultError(`No stack ${id}`, pc);
}

function matchAt(matchers: readonly MatchFn[], index: number, input: string, pos: number, pc: number): number {
  const match = matchers.at(index);
  if (!match) throw new VmFaultError(`No matcher ${index}`, pc);
  return match(input, pos);
}
