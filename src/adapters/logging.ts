import type { ArchiveReader, RecordData } from "../core/archive/reader";
import type { TypeDescriptor } from "../core/types/descriptor";
import type { TypeLoader } from "../core/types/registry";
import type { Tensor, TensorMaterializer, TensorSpec } from "../core/values/tensor";
import type { TraceSink } from "../ports/types";
import { makeId } from "../ports/types";

/**
 * Wrap archive reader with logging.
 */
export function loggingArchiveReader(inner: ArchiveReader, trace: TraceSink): ArchiveReader {
  return {
    getRecord(name: string): RecordData {
      const start = Date.now();
      const data = inner.getRecord(name);
      trace.emit({
        tag: "E_RecordRead",
        id: makeId("record"),
        record: name,
        bytes: data.size,
        durationMs: Date.now() - start,
      });
      return data;
    },
    hasRecord(name: string): boolean {
      return inner.hasRecord(name);
    },
    listRecords(): string[] {
      return inner.listRecords();
    },
  };
}

/**
 * Wrap type loader with logging. Failed loads are traced before the error
 * propagates.
 */
export function loggingTypeLoader(inner: TypeLoader, trace: TraceSink): TypeLoader {
  return {
    load(qualifiedName: string): TypeDescriptor | undefined {
      const id = makeId("type");
      const start = Date.now();
      try {
        const descriptor = inner.load(qualifiedName);
        trace.emit({
          tag: "E_TypeLoaded",
          id,
          typeName: qualifiedName,
          found: descriptor !== undefined,
          durationMs: Date.now() - start,
        });
        return descriptor;
      } catch (error) {
        trace.emit({
          tag: "E_TypeLoaded",
          id,
          typeName: qualifiedName,
          found: false,
          durationMs: Date.now() - start,
        });
        throw error;
      }
    },
  };
}

/**
 * Wrap tensor materializer with logging.
 */
export function loggingMaterializer(inner: TensorMaterializer, trace: TraceSink): TensorMaterializer {
  return {
    materialize(spec: TensorSpec, device?: string): Tensor {
      const tensor = inner.materialize(spec, device);
      trace.emit({
        tag: "E_TensorMaterialized",
        id: makeId("tensor"),
        storage: spec.storage.key,
        dtype: tensor.dtype,
        shape: [...tensor.shape],
        device: tensor.device,
      });
      return tensor;
    },
  };
}
