import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/core/config";

describe("config", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  function writeTemp(name: string, content: string): string {
    tempDir = tempDir ?? fs.mkdtempSync(path.join(os.tmpdir(), "graph-archive-config-"));
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  describe("configFromEnv", () => {
    it("falls back to defaults for unset variables", () => {
      expect(configFromEnv("GRAPH_ARCHIVE", {})).toEqual({ ...DEFAULT_CONFIG, device: undefined });
    });

    it("reads prefixed variables", () => {
      const config = configFromEnv("GRAPH_ARCHIVE", {
        GRAPH_ARCHIVE_DEVICE: "cuda:0",
        GRAPH_ARCHIVE_ALLOW_LEGACY: "false",
        GRAPH_ARCHIVE_MAX_VERSION: "3",
        GRAPH_ARCHIVE_MAX_STACK_DEPTH: "5000",
        GRAPH_ARCHIVE_TRACE: "yes",
      });

      expect(config).toEqual({
        device: "cuda:0",
        allowLegacy: false,
        minVersion: 1,
        maxVersion: 3,
        maxStackDepth: 5000,
        trace: true,
      });
    });

    it("ignores numbers that do not parse", () => {
      expect(configFromEnv("GRAPH_ARCHIVE", { GRAPH_ARCHIVE_MIN_VERSION: "soon" }).minVersion).toBe(1);
    });
  });

  describe("configFromObject", () => {
    it("accepts camelCase and snake_case keys and drops mistyped values", () => {
      expect(configFromObject({ max_stack_depth: 10, allowLegacy: false, trace: "on", unknown: 1 })).toEqual({
        maxStackDepth: 10,
        allowLegacy: false,
      });
    });
  });

  describe("configFromFile", () => {
    it("reads a JSON file", () => {
      const file = writeTemp("graph-archive.config.json", JSON.stringify({ device: "cpu", min_version: 2 }));

      expect(configFromFile(file)).toEqual({ device: "cpu", minVersion: 2 });
    });

    it("rejects missing files and other formats", () => {
      const yaml = writeTemp("config.yaml", "device: cpu");

      expect(() => configFromFile(path.join(os.tmpdir(), "graph-archive-missing.json"))).toThrow(
        "Config file not found"
      );
      expect(() => configFromFile(yaml)).toThrow("Unsupported config file format: .yaml");
    });

    it("rejects JSON that is not an object", () => {
      const file = writeTemp("list.json", "[1, 2]");

      expect(() => configFromFile(file)).toThrow(`Config file must hold a JSON object: ${file}`);
    });
  });

  describe("loadConfig", () => {
    it("layers overrides over file over environment", () => {
      const file = writeTemp("layered.json", JSON.stringify({ maxVersion: 4, device: "cuda:1" }));

      const config = loadConfig({
        configFile: file,
        env: { GRAPH_ARCHIVE_MAX_VERSION: "3", GRAPH_ARCHIVE_MIN_VERSION: "2", GRAPH_ARCHIVE_DEVICE: "cpu" },
        overrides: { device: "meta" },
      });

      expect(config.minVersion).toBe(2);
      expect(config.maxVersion).toBe(4);
      expect(config.device).toBe("meta");
    });
  });

  describe("mergeConfigs", () => {
    it("lets later partials win", () => {
      expect(mergeConfigs(DEFAULT_CONFIG, { trace: true }, { trace: false, maxVersion: 9 })).toEqual({
        ...DEFAULT_CONFIG,
        trace: false,
        maxVersion: 9,
      });
    });
  });

  describe("validateConfig", () => {
    it("accepts the defaults", () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("reports errors and warnings", () => {
      expect(validateConfig({ ...DEFAULT_CONFIG, minVersion: 3, maxVersion: 2, device: " " })).toEqual({
        valid: false,
        errors: ["minVersion 3 is above maxVersion 2", "device must not be empty"],
        warnings: [],
      });
      expect(validateConfig({ ...DEFAULT_CONFIG, maxStackDepth: 0 }).errors).toEqual([
        "maxStackDepth must be a positive integer",
      ]);
      expect(validateConfig({ ...DEFAULT_CONFIG, maxStackDepth: 10 }).warnings).toEqual([
        "maxStackDepth is very low, large lists may fail to load",
      ]);
    });
  });
});
