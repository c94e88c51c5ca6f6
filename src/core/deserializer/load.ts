// src/core/deserializer/load.ts
// Entry points: open a container, apply configuration, wire tracing.

import { loggingArchiveReader, loggingMaterializer, loggingTypeLoader } from "../../adapters/logging";
import type { TraceSink } from "../../ports/types";
import { consoleTraceSink } from "../../ports/types";
import type { ReadAdapter } from "../archive/adapters";
import { FileReadAdapter, collectStream, readAll } from "../archive/adapters";
import type { ArchiveReader } from "../archive/reader";
import { ZipArchiveReader } from "../archive/reader";
import type { LoaderConfig } from "../config/config";
import { loadConfig, validateConfig } from "../config/config";
import { ConfigError } from "../errors";
import type { TypeLoader } from "../types/registry";
import type { TensorMaterializer } from "../values/tensor";
import { defaultMaterializer } from "../values/tensor";
import type { LegacyImporter, LoadedModule } from "./deserializer";
import { ModuleDeserializer } from "./deserializer";

export type LoadInput = Uint8Array | string | ReadAdapter;

export type LoadOptions = {
  types: TypeLoader;
  /** Overrides `config.device` */
  device?: string;
  /** Requested extra files with their defaults; filled in place */
  extraFiles?: Map<string, string>;
  materializer?: TensorMaterializer;
  legacy?: LegacyImporter;
  trace?: TraceSink;
  /** Layered over environment and config file */
  config?: Partial<LoaderConfig>;
  /** Explicit config file instead of the default lookup */
  configFile?: string;
};

/**
 * Load a saved module from bytes, a file path or a read adapter.
 */
export function load(input: LoadInput, options: LoadOptions): LoadedModule {
  const config = loadConfig({ configFile: options.configFile, overrides: options.config });
  const check = validateConfig(config);
  if (!check.valid) throw new ConfigError(check.errors);

  const bytes = openInput(input);
  return loadArchive(new ZipArchiveReader(bytes), options, config);
}

/**
 * Collect a byte stream, then load it.
 */
export async function loadFromStream(
  stream: AsyncIterable<Uint8Array | string>,
  options: LoadOptions
): Promise<LoadedModule> {
  const bytes = await collectStream(stream);
  return load(bytes, options);
}

/**
 * Load from an already opened archive. Configuration is taken as given.
 */
export function loadArchive(reader: ArchiveReader, options: LoadOptions, config: LoaderConfig): LoadedModule {
  const trace = options.trace ?? (config.trace ? consoleTraceSink() : undefined);
  const materializer = options.materializer ?? defaultMaterializer;

  const deserializer = new ModuleDeserializer(trace ? loggingArchiveReader(reader, trace) : reader, {
    types: trace ? loggingTypeLoader(options.types, trace) : options.types,
    materializer: trace ? loggingMaterializer(materializer, trace) : materializer,
    device: options.device ?? config.device,
    legacy: options.legacy,
    allowLegacy: config.allowLegacy,
    minVersion: config.minVersion,
    maxVersion: config.maxVersion,
    maxStackDepth: config.maxStackDepth,
    trace,
  });
  return deserializer.deserialize(options.extraFiles);
}

function openInput(input: LoadInput): Uint8Array {
  if (input instanceof Uint8Array) return input;
  if (typeof input === "string") {
    const file = new FileReadAdapter(input);
    try {
      return readAll(file);
    } finally {
      file.close();
    }
  }
  return readAll(input);
}
