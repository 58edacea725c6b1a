import { describe, it, expect } from "vitest";
import { PegcodeError, ErrorCode, isPegcodeError, lineCol } from "../errors.js";

class SampleError extends PegcodeError {
  constructor() {
    super(ErrorCode.Assembly, "unresolved label");
  }
}

describe("PegcodeError", () => {
  it("takes its name from the subclass", () => {
    const err = new SampleError();
    expect(err.name).toBe("SampleError");
    expect(err.message).toBe("unresolved label");
    expect(err.code).toBe("PEG2004");
    expect(err).toBeInstanceOf(Error);
  });

  it("separates internal faults from user errors", () => {
    expect(new SampleError().internal).toBe(true);
    expect(new PegcodeError(ErrorCode.NoRule, "empty").internal).toBe(false);
  });

  it("is recognised by isPegcodeError", () => {
    expect(isPegcodeError(new SampleError())).toBe(true);
    expect(isPegcodeError(new Error("plain"))).toBe(false);
  });
});

describe("lineCol", () => {
  it("counts lines and columns from 1", () => {
    expect(lineCol("ab\ncd", 0)).toEqual({ line: 1, col: 1 });
    expect(lineCol("ab\ncd", 4)).toEqual({ line: 2, col: 2 });
  });
});
