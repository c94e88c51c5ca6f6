// src/core/pickle/globals.ts
// Stack items internal to the interpreter and the builtin globals writers emit.

import type { TypeDescriptor } from "../types/descriptor";
import { BoolType, FloatType, IntType, TensorType } from "../types/typeExpr";
import type { TypeExpr } from "../types/typeExpr";
import type { DType, Storage, TensorMaterializer } from "../values/tensor";
import type { TaggedValue } from "../values/values";
import { vdict, vlist, vtensor } from "../values/values";

// ─────────────────────────────────────────────────────────────────
// Stack items
// ─────────────────────────────────────────────────────────────────

export type ClassRef = { tag: "ClassRef"; type: TypeDescriptor };
export type FunctionRef = { tag: "FunctionRef"; name: string; call: BuiltinFunction };
export type DTypeRef = { tag: "DTypeRef"; dtype: DType };
export type StorageRef = { tag: "StorageRef"; storage: Storage };
/** Tuple holding at least one internal reference; never escapes the interpreter */
export type RawTuple = { tag: "RawTuple"; items: StackItem[] };

export type InternalRef = ClassRef | FunctionRef | DTypeRef | StorageRef | RawTuple;
export type StackItem = TaggedValue | InternalRef;

export function isInternal(item: StackItem): item is InternalRef {
  switch (item.tag) {
    case "ClassRef":
    case "FunctionRef":
    case "DTypeRef":
    case "StorageRef":
    case "RawTuple":
      return true;
    default:
      return false;
  }
}

// ─────────────────────────────────────────────────────────────────
// Builtin functions
// ─────────────────────────────────────────────────────────────────

export interface BuiltinContext {
  materializer: TensorMaterializer;
  device?: string;
  /** Abort with a MalformedArchiveError at the current offset */
  fail(detail: string): never;
}

export type BuiltinFunction = (args: StackItem[], ctx: BuiltinContext) => TaggedValue;

function smallInt(item: StackItem | undefined, what: string, ctx: BuiltinContext): number {
  if (item?.tag !== "Int") return ctx.fail(`${what} must be an int`);
  const n = Number(item.value);
  if (!Number.isSafeInteger(n)) return ctx.fail(`${what} is out of range: ${item.value}`);
  return n;
}

function intTuple(item: StackItem | undefined, what: string, ctx: BuiltinContext): number[] {
  if (item?.tag !== "Tuple") return ctx.fail(`${what} must be a tuple of ints`);
  return item.items.map((el, i) => smallInt(el, `${what}[${i}]`, ctx));
}

const rebuildTensor: BuiltinFunction = (args, ctx) => {
  const [storage, offset, size, stride, requiresGrad] = args;
  if (storage?.tag !== "StorageRef") return ctx.fail("tensor rebuild expects a storage as first argument");
  if (requiresGrad !== undefined && requiresGrad.tag !== "Bool") {
    return ctx.fail("tensor rebuild expects requires_grad to be a bool");
  }
  const tensor = ctx.materializer.materialize(
    {
      storage: storage.storage,
      storageOffset: smallInt(offset, "storage offset", ctx),
      size: intTuple(size, "size", ctx),
      stride: intTuple(stride, "stride", ctx),
      requiresGrad: requiresGrad?.value ?? false,
    },
    ctx.device
  );
  return vtensor(tensor);
};

const orderedDict: BuiltinFunction = (args, ctx) => {
  if (args.length !== 0) return ctx.fail("OrderedDict() takes no arguments here");
  return vdict();
};

function typedListBuilder(elementType: TypeExpr, tag: TaggedValue["tag"]): BuiltinFunction {
  return (args, ctx) => {
    const [list] = args;
    if (args.length !== 1 || list.tag !== "List") return ctx.fail("typed list builder expects one list argument");
    list.items.forEach((item, i) => {
      if (item.tag !== tag) ctx.fail(`typed list element ${i} is ${item.tag}, expected ${tag}`);
    });
    return vlist([...list.items], elementType);
  };
}

const STORAGE_TYPES: Record<string, DType> = {
  FloatStorage: "float32",
  DoubleStorage: "float64",
  HalfStorage: "float16",
  LongStorage: "int64",
  IntStorage: "int32",
  ShortStorage: "int16",
  CharStorage: "int8",
  ByteStorage: "uint8",
  BoolStorage: "bool",
};

const STORAGE_MODULE = "torch";

const FUNCTIONS = new Map<string, BuiltinFunction>([
  ["torch._utils._rebuild_tensor_v2", rebuildTensor],
  ["collections.OrderedDict", orderedDict],
  ["torch.jit._pickle.build_intlist", typedListBuilder(IntType, "Int")],
  ["torch.jit._pickle.build_doublelist", typedListBuilder(FloatType, "Float")],
  ["torch.jit._pickle.build_boollist", typedListBuilder(BoolType, "Bool")],
  ["torch.jit._pickle.build_tensorlist", typedListBuilder(TensorType, "Tensor")],
]);

/**
 * Builtin referenced by a GLOBAL instruction, or undefined when the name is
 * a user type to be resolved.
 */
export function lookupBuiltin(module: string, name: string): InternalRef | undefined {
  if (module === STORAGE_MODULE && Object.prototype.hasOwnProperty.call(STORAGE_TYPES, name)) {
    return { tag: "DTypeRef", dtype: STORAGE_TYPES[name] };
  }
  const qualified = `${module}.${name}`;
  const fn = FUNCTIONS.get(qualified);
  return fn ? { tag: "FunctionRef", name: qualified, call: fn } : undefined;
}
