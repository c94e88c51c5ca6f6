// src/core/values/tensor.ts
// Minimal tensor representation over raw storage records.

import { MalformedArchiveError } from "../errors";

export type DType =
  | "float32"
  | "float64"
  | "float16"
  | "int64"
  | "int32"
  | "int16"
  | "int8"
  | "uint8"
  | "bool";

export const DTYPE_BYTES: Record<DType, number> = {
  float32: 4,
  float64: 8,
  float16: 2,
  int64: 8,
  int32: 4,
  int16: 2,
  int8: 1,
  uint8: 1,
  bool: 1,
};

/**
 * Raw numeric buffer read from an auxiliary record.
 * Tensors built from the same record share one Storage.
 */
export interface Storage {
  /** Record key relative to the archive ("0", "1", ...) */
  key: string;
  dtype: DType;
  /** Location recorded by the writer ("cpu", "cuda:0") */
  location: string;
  numel: number;
  bytes: Uint8Array;
}

export interface TensorSpec {
  storage: Storage;
  storageOffset: number;
  size: number[];
  stride: number[];
  requiresGrad: boolean;
}

export type TensorElement = number | bigint | boolean;

export class Tensor {
  constructor(
    readonly storage: Storage,
    readonly storageOffset: number,
    readonly shape: readonly number[],
    readonly stride: readonly number[],
    readonly device: string,
    readonly requiresGrad: boolean
  ) {}

  get dtype(): DType {
    return this.storage.dtype;
  }

  get numel(): number {
    return this.shape.reduce((n, d) => n * d, 1);
  }

  /**
   * Elements in row-major order, following strides into the storage.
   */
  toArray(): TensorElement[] {
    const view = new DataView(this.storage.bytes.buffer, this.storage.bytes.byteOffset, this.storage.bytes.byteLength);
    const out: TensorElement[] = [];
    const total = this.numel;
    const index = new Array<number>(this.shape.length).fill(0);

    for (let n = 0; n < total; n++) {
      let pos = this.storageOffset;
      for (let d = 0; d < index.length; d++) pos += index[d] * this.stride[d];
      out.push(readElement(view, pos, this.dtype));

      for (let d = index.length - 1; d >= 0; d--) {
        index[d]++;
        if (index[d] < this.shape[d]) break;
        index[d] = 0;
      }
    }
    return out;
  }
}

function readElement(view: DataView, index: number, dtype: DType): TensorElement {
  const at = index * DTYPE_BYTES[dtype];
  switch (dtype) {
    case "float32": return view.getFloat32(at, true);
    case "float64": return view.getFloat64(at, true);
    case "float16": return halfToFloat(view.getUint16(at, true));
    case "int64": return view.getBigInt64(at, true);
    case "int32": return view.getInt32(at, true);
    case "int16": return view.getInt16(at, true);
    case "int8": return view.getInt8(at);
    case "uint8": return view.getUint8(at);
    case "bool": return view.getUint8(at) !== 0;
  }
}

function halfToFloat(h: number): number {
  const sign = h & 0x8000 ? -1 : 1;
  const exp = (h >> 10) & 0x1f;
  const frac = h & 0x3ff;
  if (exp === 0) return sign * Math.pow(2, -14) * (frac / 1024);
  if (exp === 0x1f) return frac ? NaN : sign * Infinity;
  return sign * Math.pow(2, exp - 15) * (1 + frac / 1024);
}

// ─────────────────────────────────────────────────────────────────
// Materialization
// ─────────────────────────────────────────────────────────────────

/**
 * Turns a storage plus view metadata into a Tensor value.
 */
export interface TensorMaterializer {
  materialize(spec: TensorSpec, device?: string): Tensor;
}

/**
 * Checks that the view stays inside its storage and places the tensor on
 * the override device when one is given, else on the recorded location.
 */
export const defaultMaterializer: TensorMaterializer = {
  materialize(spec: TensorSpec, device?: string): Tensor {
    const { storage, storageOffset, size, stride } = spec;
    if (size.length !== stride.length) {
      throw new MalformedArchiveError(
        `tensor over storage '${storage.key}' has ${size.length} sizes but ${stride.length} strides`
      );
    }
    if (size.some(d => d < 0) || storageOffset < 0) {
      throw new MalformedArchiveError(`tensor over storage '${storage.key}' has a negative size or offset`);
    }
    if (!size.includes(0)) {
      const last = size.reduce((acc, d, i) => acc + (d - 1) * stride[i], storageOffset);
      if (last >= storage.numel) {
        throw new MalformedArchiveError(
          `tensor view reaches element ${last} of storage '${storage.key}' holding ${storage.numel}`
        );
      }
    }
    return new Tensor(storage, storageOffset, size, stride, device ?? storage.location, spec.requiresGrad);
  },
};
