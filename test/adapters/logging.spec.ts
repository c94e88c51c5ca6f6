import { strToU8 } from "fflate";
import { describe, expect, it } from "vitest";
import { loggingArchiveReader, loggingMaterializer, loggingTypeLoader } from "../../src/adapters/logging";
import { MemoryArchiveReader } from "../../src/core/archive/reader";
import { defaultMaterializer } from "../../src/core/values/tensor";
import type { LoadTraceEvent } from "../../src/ports";
import { collectingTraceSink, consoleTraceSink, makeId } from "../../src/ports";
import { float32Bytes } from "../helpers/pickle";
import { demoRegistry } from "../helpers/types";

describe("logging adapters", () => {
  it("trace record reads with their size", () => {
    const events: LoadTraceEvent[] = [];
    const reader = loggingArchiveReader(
      new MemoryArchiveReader({ "data.pkl": strToU8("abc") }),
      collectingTraceSink(events)
    );

    reader.getRecord("data.pkl");

    expect(reader.hasRecord("data.pkl")).toBe(true);
    expect(reader.listRecords()).toEqual(["data.pkl"]);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ tag: "E_RecordRead", record: "data.pkl", bytes: 3 });
  });

  it("trace type loads, including misses and failures", () => {
    const sink = collectingTraceSink();
    const loader = loggingTypeLoader(demoRegistry(), sink);
    const failing = loggingTypeLoader(
      {
        load: () => {
          throw new Error("loader broke");
        },
      },
      sink
    );

    loader.load("demo.Pair");
    loader.load("demo.Missing");
    expect(() => failing.load("demo.Pair")).toThrow("loader broke");

    expect(sink.events.map(e => (e.tag === "E_TypeLoaded" ? [e.typeName, e.found] : []))).toEqual([
      ["demo.Pair", true],
      ["demo.Missing", false],
      ["demo.Pair", false],
    ]);
  });

  it("trace materialized tensors", () => {
    const sink = collectingTraceSink();
    const materializer = loggingMaterializer(defaultMaterializer, sink);
    const storage = { key: "3", dtype: "float32" as const, location: "cpu", numel: 4, bytes: float32Bytes([1, 2, 3, 4]) };

    materializer.materialize({ storage, storageOffset: 0, size: [2, 2], stride: [2, 1], requiresGrad: false }, "meta");

    expect(sink.events).toEqual([
      { tag: "E_TensorMaterialized", id: expect.any(String), storage: "3", dtype: "float32", shape: [2, 2], device: "meta" },
    ]);
  });
});

describe("trace sinks", () => {
  it("print one line per event", () => {
    const lines: string[] = [];
    const sink = consoleTraceSink(line => lines.push(line));

    sink.emit({ tag: "E_ExtraFile", id: "extra:1", key: "notes.txt", found: true });

    expect(lines).toEqual(['[graph-archive] E_ExtraFile extra:1 {"key":"notes.txt","found":true}']);
  });

  it("make ids prefixed with their kind", () => {
    expect(makeId("record")).toMatch(/^record:\d+:[a-z0-9]+$/);
  });
});
