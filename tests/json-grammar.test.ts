import { describe, it, expect } from "vitest";
import * as fs from "fs";
import { fileURLToPath } from "url";
import { readGrammar } from "@pegcode/grammar";
import { generateProgram } from "@pegcode/generator";
import { checkProgram } from "@pegcode/bytecode";
import { createVm, ParseFailedError } from "@pegcode/vm";
import { silentLogger } from "@pegcode/core";
import { emitJson, loadProgram } from "../src/emit/index.js";

const source = fs.readFileSync(fileURLToPath(new URL("./fixtures/json.peg", import.meta.url)), "utf8");
const program = generateProgram(readGrammar(source), { logger: silentLogger });
const vm = createVm(program, { logger: silentLogger });

describe("JSON grammar", () => {
  it("compiles to a well-formed program", () => {
    expect(checkProgram(program)).toEqual([]);
    expect(program.rules).toHaveLength(10);
    expect(program.strings.slice(0, 13)).toEqual([
      "Json",
      "Value",
      "Object",
      "Members",
      "Member",
      "Array",
      "Values",
      "String",
      "Number",
      "_",
      "string",
      "number",
      "v",
    ]);
  });

  it("builds nested values", () => {
    expect(vm.parse(' {"a": [1, -2.5, "x"], "b": {"c": null, "d": true}, "e": []} ')).toEqual({
      a: [1, -2.5, "x"],
      b: { c: null, d: true },
      e: [],
    });
  });

  it("parses scalars", () => {
    expect(vm.parse("false")).toBe(false);
    expect(vm.parse('""')).toBe("");
    expect(vm.parse("10")).toBe(10);
  });

  it("reports where the document stops making sense", () => {
    let failure: unknown;
    try {
      vm.parse('{"a" 1}');
    } catch (error) {
      failure = error;
    }
    expect(failure).toBeInstanceOf(ParseFailedError);
    expect(failure).toMatchObject({ pos: 5, expected: ['":"', "[ \\t\\n\\r]"], rule: "_" });
  });

  it("runs the same after a serialization round trip", () => {
    const reloaded = createVm(loadProgram(emitJson(program)), { logger: silentLogger });
    expect(reloaded.parse("[true, {}]")).toEqual([true, {}]);
  });
});
