import { describe, it, expect } from "vitest";
import { createLogger, silentLogger, type LogLevel } from "../logger.js";

function capture(verbose: boolean) {
  const lines: Array<[string, LogLevel]> = [];
  const logger = createLogger("generator", {
    verbose,
    writer: (line, level) => lines.push([line, level]),
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("prefixes lines with the scope", () => {
    const { logger, lines } = capture(false);
    logger.info("compiled 3 rules");
    expect(lines).toEqual([["[pegcode:generator] compiled 3 rules", "info"]]);
  });

  it("tags warnings and errors", () => {
    const { logger, lines } = capture(false);
    logger.warn("slow");
    logger.error("broken");
    expect(lines.map(([line]) => line)).toEqual([
      "[pegcode:generator] warn: slow",
      "[pegcode:generator] error: broken",
    ]);
  });

  it("drops debug lines unless verbose", () => {
    const quiet = capture(false);
    quiet.logger.debug("hidden");
    expect(quiet.lines).toEqual([]);

    const loud = capture(true);
    loud.logger.debug("shown");
    expect(loud.lines).toEqual([["[pegcode:generator] shown", "debug"]]);
  });

  it("nests child scopes and keeps the writer", () => {
    const { logger, lines } = capture(true);
    const child = logger.child("rules");
    child.debug("rule A");
    expect(child.scope).toBe("generator:rules");
    expect(lines).toEqual([["[pegcode:generator:rules] rule A", "debug"]]);
  });

  it("silentLogger writes nothing", () => {
    expect(silentLogger.verbose).toBe(false);
    expect(() => silentLogger.error("ignored")).not.toThrow();
  });
});
