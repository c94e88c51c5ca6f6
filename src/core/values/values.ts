// src/core/values/values.ts
// Decoded values produced by the instruction-stream interpreter.

import type { TypeExpr } from "../types/typeExpr";
import { AnyType } from "../types/typeExpr";
import type { ObjectInstance } from "./object";
import type { Tensor } from "./tensor";

export type NoneValue = { tag: "None" };
export type BoolValue = { tag: "Bool"; value: boolean };
export type IntValue = { tag: "Int"; value: bigint };
export type FloatValue = { tag: "Float"; value: number };
export type StringValue = { tag: "String"; value: string };

/**
 * Ordered list. `elementType` is Any when decoded generically and may be
 * narrowed by type-tag reconciliation.
 */
export type ListValue = { tag: "List"; elementType: TypeExpr; items: TaggedValue[] };
export type TupleValue = { tag: "Tuple"; items: TaggedValue[] };

export type DictEntry = { key: TaggedValue; value: TaggedValue };

/**
 * Insertion-ordered mapping with unique keys. Entries are indexed by the
 * canonical form of their key (see dictKey).
 */
export type DictValue = {
  tag: "Dict";
  keyType: TypeExpr;
  valueType: TypeExpr;
  entries: Map<string, DictEntry>;
};

export type TensorValue = { tag: "Tensor"; tensor: Tensor };
export type ObjectValue = { tag: "Object"; object: ObjectInstance };

export type TaggedValue =
  | NoneValue
  | BoolValue
  | IntValue
  | FloatValue
  | StringValue
  | ListValue
  | TupleValue
  | DictValue
  | TensorValue
  | ObjectValue;

export const VNone: NoneValue = { tag: "None" };
export const VTrue: BoolValue = { tag: "Bool", value: true };
export const VFalse: BoolValue = { tag: "Bool", value: false };

export const vbool = (value: boolean): BoolValue => (value ? VTrue : VFalse);
export const vint = (value: bigint | number): IntValue => ({ tag: "Int", value: BigInt(value) });
export const vfloat = (value: number): FloatValue => ({ tag: "Float", value });
export const vstr = (value: string): StringValue => ({ tag: "String", value });
export const vlist = (items: TaggedValue[], elementType: TypeExpr = AnyType): ListValue => ({
  tag: "List",
  elementType,
  items,
});
export const vtuple = (items: TaggedValue[]): TupleValue => ({ tag: "Tuple", items });
export const vtensor = (tensor: Tensor): TensorValue => ({ tag: "Tensor", tensor });
export const vobject = (object: ObjectInstance): ObjectValue => ({ tag: "Object", object });

export function vdict(
  entries: Array<[TaggedValue, TaggedValue]> = [],
  keyType: TypeExpr = AnyType,
  valueType: TypeExpr = AnyType
): DictValue {
  const dict: DictValue = { tag: "Dict", keyType, valueType, entries: new Map() };
  for (const [k, v] of entries) dictSet(dict, k, v);
  return dict;
}

// ─────────────────────────────────────────────────────────────────
// Dict helpers
// ─────────────────────────────────────────────────────────────────

const tensorIds = new WeakMap<Tensor, number>();
let nextTensorId = 0;

/** Tensors compare by identity */
function tensorId(tensor: Tensor): number {
  let id = tensorIds.get(tensor);
  if (id === undefined) {
    id = nextTensorId++;
    tensorIds.set(tensor, id);
  }
  return id;
}

/**
 * Canonical key for a hashable value, undefined for containers and
 * objects.
 */
export function dictKey(key: TaggedValue): string | undefined {
  switch (key.tag) {
    case "None": return "N";
    case "Bool": return key.value ? "b:1" : "b:0";
    case "Int": return `i:${key.value}`;
    case "Float": return `f:${key.value}`;
    case "String": return `s:${key.value}`;
    case "Tensor": return `t:${tensorId(key.tensor)}`;
    default: return undefined;
  }
}

/**
 * Insert or overwrite. An overwritten key keeps its original position.
 */
export function dictSet(dict: DictValue, key: TaggedValue, value: TaggedValue): void {
  const k = dictKey(key);
  if (k === undefined) {
    throw new TypeError(`Unhashable dict key of kind ${key.tag}`);
  }
  const existing = dict.entries.get(k);
  if (existing) {
    existing.value = value;
  } else {
    dict.entries.set(k, { key, value });
  }
}

export function dictGet(dict: DictValue, key: TaggedValue): TaggedValue | undefined {
  const k = dictKey(key);
  return k === undefined ? undefined : dict.entries.get(k)?.value;
}

export function dictGetStr(dict: DictValue, key: string): TaggedValue | undefined {
  return dict.entries.get(`s:${key}`)?.value;
}

// ─────────────────────────────────────────────────────────────────
// Inspection
// ─────────────────────────────────────────────────────────────────

/**
 * Short variant description used in error messages.
 */
export function describeValue(v: TaggedValue): string {
  switch (v.tag) {
    case "List": return `List(${v.items.length})`;
    case "Tuple": return `Tuple(${v.items.length})`;
    case "Dict": return `Dict(${v.entries.size})`;
    case "Object": return `Object(${v.object.type.qualifiedName})`;
    default: return v.tag;
  }
}

export type PlainValue =
  | null
  | boolean
  | bigint
  | number
  | string
  | Tensor
  | PlainValue[]
  | Map<PlainValue, PlainValue>
  | PlainObject;

export type PlainObject = { __type: string; [attribute: string]: PlainValue | undefined };

/**
 * Convert a decoded value into plain JS data. Shared objects map to the
 * same plain object, so cycles survive the conversion.
 */
export function toPlain(v: TaggedValue, seen: Map<ObjectInstance, PlainObject> = new Map()): PlainValue {
  switch (v.tag) {
    case "None": return null;
    case "Bool":
    case "Int":
    case "Float":
    case "String":
      return v.value;
    case "List":
    case "Tuple":
      return v.items.map(item => toPlain(item, seen));
    case "Dict": {
      const out = new Map<PlainValue, PlainValue>();
      for (const { key, value } of v.entries.values()) {
        out.set(toPlain(key, seen), toPlain(value, seen));
      }
      return out;
    }
    case "Tensor": return v.tensor;
    case "Object": {
      const cached = seen.get(v.object);
      if (cached) return cached;
      const out: PlainObject = { __type: v.object.type.qualifiedName };
      seen.set(v.object, out);
      v.object.type.attributes.forEach((attr, i) => {
        const slot = v.object.slots[i];
        out[attr.name] = slot === undefined ? undefined : toPlain(slot, seen);
      });
      return out;
    }
  }
}
