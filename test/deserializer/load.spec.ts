import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { BufferReadAdapter } from "../../src/core/archive/adapters";
import { load, loadFromStream } from "../../src/core/deserializer/load";
import { ConfigError, MalformedArchiveError, UnsupportedFormatError } from "../../src/core/errors";
import type { LoadTraceEvent } from "../../src/ports/types";
import { collectingTraceSink } from "../../src/ports/types";
import { EMPTY_CONSTANTS, float32Bytes, makeContainer, pickled } from "../helpers/pickle";
import { demoRegistry, writePair } from "../helpers/types";

const container = makeContainer({
  "constants.pkl": EMPTY_CONSTANTS,
  "data.pkl": pickled(w => writePair(w, 0, 3, "three")),
  "extra/notes.txt": "saved by test",
});

const tensorContainer = makeContainer({
  "constants.pkl": pickled(w => w.tensor1d("0", 2).tuple(1)),
  "constants/0": float32Bytes([0.5, -1]),
  "data.pkl": pickled(w => writePair(w, 0, 1, "one")),
});

describe("load", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
    vi.restoreAllMocks();
  });

  it("loads a container from bytes", () => {
    const module = load(container, { types: demoRegistry() });

    expect(module.typeName).toBe("demo.Pair");
    expect(module.attr("first")).toEqual({ tag: "Int", value: 3n });
  });

  it("loads a container from a file path", () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "graph-archive-"));
    const file = path.join(tempDir, "module.pt");
    fs.writeFileSync(file, container);

    const module = load(file, { types: demoRegistry() });

    expect(module.attr("second")).toEqual({ tag: "String", value: "three" });
  });

  it("loads a container through a read adapter", () => {
    const module = load(new BufferReadAdapter(container), { types: demoRegistry() });

    expect(module.typeName).toBe("demo.Pair");
  });

  it("loads a container from a chunked stream", async () => {
    async function* chunks(): AsyncGenerator<Uint8Array> {
      yield container.subarray(0, 10);
      yield container.subarray(10);
    }

    const module = await loadFromStream(chunks(), { types: demoRegistry() });

    expect(module.attr("first")).toEqual({ tag: "Int", value: 3n });
  });

  it("fills requested extra files", () => {
    const extraFiles = new Map([["notes.txt", ""]]);

    load(container, { types: demoRegistry(), extraFiles });

    expect(extraFiles.get("notes.txt")).toBe("saved by test");
  });

  it("rejects bytes that are not a ZIP container", () => {
    expect(() => load(new Uint8Array(64), { types: demoRegistry() })).toThrow(MalformedArchiveError);
  });

  it("throws ConfigError for an invalid configuration", () => {
    expect(() => load(container, { types: demoRegistry(), config: { minVersion: 3, maxVersion: 1 } })).toThrow(
      ConfigError
    );
    expect(() => load(container, { types: demoRegistry(), config: { minVersion: 3, maxVersion: 1 } })).toThrow(
      "Invalid loader configuration: minVersion 3 is above maxVersion 1"
    );
  });

  it("applies the configured version range", () => {
    const versioned = makeContainer({
      version: "2",
      "constants.pkl": EMPTY_CONSTANTS,
      "data.pkl": pickled(w => writePair(w, 0, 3, "three")),
    });

    expect(() => load(versioned, { types: demoRegistry(), config: { maxVersion: 1 } })).toThrow(
      UnsupportedFormatError
    );
  });

  it("refuses legacy containers when configured to", () => {
    const legacyContainer = makeContainer({ "model.json": "{}" });
    const calls: string[] = [];

    expect(() =>
      load(legacyContainer, {
        types: demoRegistry(),
        legacy: {
          deserializeLegacy: () => {
            calls.push("legacy");
            throw new Error("should not be called");
          },
        },
        config: { allowLegacy: false },
      })
    ).toThrow(UnsupportedFormatError);
    expect(calls).toEqual([]);
  });

  it("prefers the device option over the configured device", () => {
    const fromConfig = load(tensorContainer, { types: demoRegistry(), config: { device: "cuda:0" } });
    const fromOption = load(tensorContainer, { types: demoRegistry(), device: "meta", config: { device: "cuda:0" } });

    expect(fromConfig.constants[0].device).toBe("cuda:0");
    expect(fromOption.constants[0].device).toBe("meta");
    expect(fromOption.constants[0].toArray()).toEqual([0.5, -1]);
  });

  describe("tracing", () => {
    it("traces record reads, type loads and tensors through the given sink", () => {
      const events: LoadTraceEvent[] = [];

      load(tensorContainer, { types: demoRegistry(), trace: collectingTraceSink(events) });

      const records = events.flatMap(e => (e.tag === "E_RecordRead" ? [e.record] : []));
      const types = events.flatMap(e => (e.tag === "E_TypeLoaded" ? [`${e.typeName}:${e.found}`] : []));
      const tensors = events.flatMap(e =>
        e.tag === "E_TensorMaterialized" ? [{ storage: e.storage, dtype: e.dtype, shape: e.shape, device: e.device }] : []
      );

      expect(records).toEqual(["constants.pkl", "constants/0", "data.pkl"]);
      expect(types).toEqual(["demo.Pair:true"]);
      expect(tensors).toEqual([{ storage: "0", dtype: "float32", shape: [2], device: "cpu" }]);
    });

    it("prints to the console when tracing is configured without a sink", () => {
      const lines: string[] = [];
      vi.spyOn(console, "log").mockImplementation((line: string) => {
        lines.push(line);
      });

      load(container, { types: demoRegistry(), config: { trace: true } });

      expect(lines.some(line => line.startsWith("[graph-archive] E_ArchiveRead "))).toBe(true);
    });
  });
});
