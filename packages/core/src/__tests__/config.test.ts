/**
 * Tests for the configuration system
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config, defineConfig, parseEnvConfig, readConfigFiles, DEFAULT_CONFIG } from "../config.js";
import { ConfigError } from "../errors.js";

describe("config", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    delete process.env.PEGCODE_VM__MAX_STEPS;
    delete process.env.PEGCODE_VERBOSE;
    config.reset();
  });

  describe("defaults", () => {
    it("resolves every option", () => {
      expect(config.resolved()).toEqual(DEFAULT_CONFIG);
    });

    it("reads nested values by path", () => {
      expect(config.get("vm.maxSteps")).toBe(10_000_000);
      expect(config.get("emit.format")).toBe("json");
      expect(config.get("missing.path")).toBeUndefined();
    });

    it("finds no config file in the workspace", () => {
      expect(config.getConfigFilePath()).toBeUndefined();
    });
  });

  describe("set", () => {
    it("merges nested values", () => {
      config.set({ vm: { maxSteps: 42 } });
      expect(config.get("vm.maxSteps")).toBe(42);
      expect(config.get("emit.format")).toBe("json");
    });

    it("keeps custom keys", () => {
      config.set({ team: { owner: "parsing" } });
      expect(config.get("team.owner")).toBe("parsing");
    });

    it("falls back to defaults for values of the wrong type", () => {
      config.set({ vm: { maxSteps: -1 }, emit: { format: "json" } });
      config.set({ verbose: true });
      expect(config.resolved().vm.maxSteps).toBe(10_000_000);
      expect(config.resolved().verbose).toBe(true);
    });

    it("is cleared by reset", () => {
      config.set({ verbose: true });
      config.reset();
      expect(config.resolved().verbose).toBe(false);
    });
  });

  describe("environment", () => {
    it("overrides defaults and programmatic values", () => {
      process.env.PEGCODE_VM__MAX_STEPS = "5000";
      process.env.PEGCODE_VERBOSE = "1";
      expect(config.resolved().vm.maxSteps).toBe(5000);
      expect(config.resolved().verbose).toBe(true);
    });

    it("maps variable names to camelCase paths", () => {
      expect(
        parseEnvConfig({
          PEGCODE_VM__MAX_STEPS: "12",
          PEGCODE_EMIT__FORMAT: "module",
          PEGCODE_VERBOSE: "false",
          OTHER_VAR: "x",
        })
      ).toEqual({
        vm: { maxSteps: 12 },
        emit: { format: "module" },
        verbose: false,
      });
    });
  });

  describe("config files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "pegcode-config-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("reads an rc file from the search directory", () => {
      fs.writeFileSync(path.join(dir, ".pegcoderc.json"), '{ "vm": { "maxSteps": 7 } }');
      expect(readConfigFiles(dir)).toEqual({ vm: { maxSteps: 7 } });
    });

    it("rejects a file that does not hold an object", () => {
      const file = path.join(dir, ".pegcoderc.json");
      fs.writeFileSync(file, "5");
      expect(() => readConfigFiles(dir)).toThrow(ConfigError);
      expect(() => readConfigFiles(dir)).toThrow(`Config in ${file} must be an object`);
    });

    it("wraps files that fail to parse", () => {
      fs.writeFileSync(path.join(dir, ".pegcoderc.json"), "{ not json");
      expect(() => readConfigFiles(dir)).toThrow(ConfigError);
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { verbose: true, emit: { format: "module" as const } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
