// src/core/deserializer/deserializer.ts
// Sequences the archive reads that rebuild a saved module.

import type { ArchiveReader } from "../archive/reader";
import { createRecordSource } from "../archive/source";
import { DefaultInstanceBuilder } from "../construct/builder";
import { MalformedArchiveError, UnsupportedFormatError } from "../errors";
import { Unpickler } from "../pickle/interpreter";
import type { TypeDescriptor } from "../types/descriptor";
import type { TypeLoader } from "../types/registry";
import { ClassResolver } from "../types/resolver";
import type { ObjectInstance } from "../values/object";
import type { Tensor, TensorMaterializer } from "../values/tensor";
import type { TaggedValue } from "../values/values";
import { describeValue } from "../values/values";
import type { TraceSink } from "../../ports/types";
import { makeId, noopTraceSink } from "../../ports/types";

/** Presence of this record marks the pre-container format */
export const LEGACY_MARKER = "model.json";
export const VERSION_RECORD = "version";
export const EXTRA_PREFIX = "extra/";

/**
 * Root object of a loaded container together with the session that
 * produced it.
 */
export class LoadedModule {
  constructor(
    readonly object: ObjectInstance,
    readonly constants: readonly Tensor[],
    /** Types bound while loading, by qualified name */
    readonly types: ReadonlyMap<string, TypeDescriptor>
  ) {}

  get typeName(): string {
    return this.object.type.qualifiedName;
  }

  attr(name: string): TaggedValue | undefined {
    return this.object.getAttr(name);
  }
}

/**
 * Reads containers in the pre-container format.
 */
export interface LegacyImporter {
  deserializeLegacy(reader: ArchiveReader, device?: string): LoadedModule;
}

export type DeserializerOptions = {
  types: TypeLoader;
  device?: string;
  materializer?: TensorMaterializer;
  legacy?: LegacyImporter;
  /** When false, legacy containers fail even if an importer is given */
  allowLegacy?: boolean;
  minVersion?: number;
  maxVersion?: number;
  maxStackDepth?: number;
  trace?: TraceSink;
};

type DeserializerState = "start" | "legacy" | "current" | "done";

/**
 * One instance per container. Owns the session's type cache, so types
 * resolved while reading "constants" are reused for "data".
 */
export class ModuleDeserializer {
  private readonly resolver: ClassResolver;
  private readonly builder: DefaultInstanceBuilder;
  private readonly trace: TraceSink;
  private readonly constants: Tensor[] = [];
  private state: DeserializerState = "start";

  constructor(private readonly reader: ArchiveReader, private readonly options: DeserializerOptions) {
    this.resolver = new ClassResolver(options.types);
    this.builder = new DefaultInstanceBuilder(this.resolver);
    this.trace = options.trace ?? noopTraceSink;
  }

  get currentState(): DeserializerState {
    return this.state;
  }

  /**
   * Load the container. Requested extra files found under "extra/<key>"
   * replace the caller's defaults in `extraFiles`; absent ones are left alone.
   */
  deserialize(extraFiles?: Map<string, string>): LoadedModule {
    if (this.state !== "start") {
      throw new Error("ModuleDeserializer has already been used");
    }

    if (extraFiles) this.readExtraFiles(extraFiles);

    if (this.reader.hasRecord(LEGACY_MARKER)) {
      this.state = "legacy";
      const result = this.deserializeLegacy();
      this.state = "done";
      return result;
    }

    this.state = "current";
    this.checkVersion();

    const constants = this.readArchive("constants");
    if (constants.tag !== "List" && constants.tag !== "Tuple") {
      throw new MalformedArchiveError(`root of constants must be a sequence, got ${describeValue(constants)}`, {
        archive: "constants",
      });
    }
    constants.items.forEach((item, i) => {
      if (item.tag !== "Tensor") {
        throw new MalformedArchiveError(`constant ${i} is ${describeValue(item)}, not a tensor`, {
          archive: "constants",
        });
      }
      this.constants.push(item.tensor);
    });

    const root = this.readArchive("data");
    if (root.tag !== "Object") {
      throw new MalformedArchiveError(`root of data must be an object, got ${describeValue(root)}`, {
        archive: "data",
      });
    }

    this.state = "done";
    return new LoadedModule(root.object, this.constants, this.resolver.loadedTypes());
  }

  /**
   * Decode `<archive>.pkl`; auxiliary records resolve to `<archive>/<name>`.
   */
  readArchive(archive: string): TaggedValue {
    const start = Date.now();
    const { bytes } = this.reader.getRecord(`${archive}.pkl`);

    const value = new Unpickler({
      archive,
      source: createRecordSource(bytes),
      resolver: this.resolver,
      builder: this.builder,
      readRecord: name => this.reader.getRecord(`${archive}/${name}`).bytes,
      materializer: this.options.materializer,
      device: this.options.device,
      maxStackDepth: this.options.maxStackDepth,
    }).parse();

    this.trace.emit({ tag: "E_ArchiveRead", id: makeId("archive"), archive, durationMs: Date.now() - start });
    return value;
  }

  private readExtraFiles(extraFiles: Map<string, string>): void {
    const decoder = new TextDecoder("utf-8");
    for (const key of extraFiles.keys()) {
      const record = `${EXTRA_PREFIX}${key}`;
      const found = this.reader.hasRecord(record);
      if (found) {
        extraFiles.set(key, decoder.decode(this.reader.getRecord(record).bytes));
      }
      this.trace.emit({ tag: "E_ExtraFile", id: makeId("extra"), key, found });
    }
  }

  private deserializeLegacy(): LoadedModule {
    const { legacy, allowLegacy = true } = this.options;
    const delegated = legacy !== undefined && allowLegacy;
    this.trace.emit({ tag: "E_LegacyDetected", id: makeId("legacy"), delegated });
    if (!legacy || !allowLegacy) {
      throw new UnsupportedFormatError(`Legacy container format ('${LEGACY_MARKER}') is not supported here`);
    }
    return legacy.deserializeLegacy(this.reader, this.options.device);
  }

  private checkVersion(): void {
    if (!this.reader.hasRecord(VERSION_RECORD)) return;
    const text = new TextDecoder("utf-8").decode(this.reader.getRecord(VERSION_RECORD).bytes).trim();
    const version = Number(text);
    if (!/^\d+$/.test(text) || !Number.isSafeInteger(version)) {
      throw new MalformedArchiveError(`version record holds '${text}'`, { record: VERSION_RECORD });
    }
    const { minVersion = 1, maxVersion = 2 } = this.options;
    if (version < minVersion || version > maxVersion) {
      throw new UnsupportedFormatError(
        `Container format version ${version} is outside the supported range ${minVersion}..${maxVersion}`
      );
    }
  }
}
