// src/core/construct/reconcile.ts
// Narrow generically decoded container tags to a declared type.

import { TypeReconciliationError } from "../errors";
import type { TypeExpr } from "../types/typeExpr";
import { renderType } from "../types/typeExpr";
import type { ObjectInstance } from "../values/object";
import type { TaggedValue } from "../values/values";
import { describeValue } from "../values/values";

const SCALAR_TAGS: Partial<Record<TypeExpr["kind"], TaggedValue["tag"]>> = {
  None: "None",
  Bool: "Bool",
  Int: "Int",
  Float: "Float",
  Str: "String",
  Tensor: "Tensor",
};

/**
 * Combine a recorded tag with the declared one. Any is replaced by the
 * declared type; a precise tag is kept and must agree with the declaration.
 * Returns undefined when they disagree.
 */
export function narrowTag(current: TypeExpr, declared: TypeExpr): TypeExpr | undefined {
  if (current.kind === "Any") return declared;
  if (declared.kind === "Any") return current;

  switch (current.kind) {
    case "List": {
      if (declared.kind !== "List") return undefined;
      const element = narrowTag(current.element, declared.element);
      return element ? { kind: "List", element } : undefined;
    }
    case "Dict": {
      if (declared.kind !== "Dict") return undefined;
      const key = narrowTag(current.key, declared.key);
      const value = narrowTag(current.value, declared.value);
      return key && value ? { kind: "Dict", key, value } : undefined;
    }
    case "Tuple": {
      if (declared.kind !== "Tuple" || declared.elements.length !== current.elements.length) return undefined;
      const elements: TypeExpr[] = [];
      for (let i = 0; i < current.elements.length; i++) {
        const el = narrowTag(current.elements[i], declared.elements[i]);
        if (!el) return undefined;
        elements.push(el);
      }
      return { kind: "Tuple", elements };
    }
    case "Optional": {
      if (declared.kind !== "Optional") return undefined;
      const inner = narrowTag(current.inner, declared.inner);
      return inner ? { kind: "Optional", inner } : undefined;
    }
    case "Class":
      return declared.kind === "Class" && declared.name === current.name ? current : undefined;
    default:
      return declared.kind === current.kind ? current : undefined;
  }
}

type Work = { value: TaggedValue; type: TypeExpr; path: string };

/**
 * Walk `value` against `declared`, overwriting imprecise List and Dict tags
 * in place. Objects reached through Class types are visited once each, so
 * cyclic graphs terminate. Fails on any structural mismatch.
 */
export function reconcileTypeTags(value: TaggedValue, declared: TypeExpr, typeName?: string): void {
  const work: Work[] = [{ value, type: declared, path: "state" }];
  const visited = new Set<ObjectInstance>();

  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    const { value: v, type: t, path } = item;
    const mismatch = (): TypeReconciliationError =>
      new TypeReconciliationError(path, renderType(t), describeValue(v), typeName);

    switch (t.kind) {
      case "Any":
        break;

      case "Optional":
        if (v.tag !== "None") work.push({ value: v, type: t.inner, path });
        break;

      case "List": {
        if (v.tag !== "List") throw mismatch();
        const element = narrowTag(v.elementType, t.element);
        if (!element) throw mismatch();
        v.elementType = element;
        v.items.forEach((el, i) => work.push({ value: el, type: t.element, path: `${path}[${i}]` }));
        break;
      }

      case "Tuple":
        if (v.tag !== "Tuple" || v.items.length !== t.elements.length) throw mismatch();
        v.items.forEach((el, i) => work.push({ value: el, type: t.elements[i], path: `${path}[${i}]` }));
        break;

      case "Dict": {
        if (v.tag !== "Dict") throw mismatch();
        const keyType = narrowTag(v.keyType, t.key);
        const valueType = narrowTag(v.valueType, t.value);
        if (!keyType || !valueType) throw mismatch();
        v.keyType = keyType;
        v.valueType = valueType;
        for (const [k, entry] of v.entries) {
          work.push({ value: entry.key, type: t.key, path: `${path}.keys(${k})` });
          work.push({ value: entry.value, type: t.value, path: `${path}[${k}]` });
        }
        break;
      }

      case "Class": {
        if (v.tag !== "Object" || v.object.type.qualifiedName !== t.name) throw mismatch();
        if (visited.has(v.object)) break;
        visited.add(v.object);
        v.object.type.attributes.forEach((attr, i) => {
          const slot = v.object.slots[i];
          if (slot !== undefined) work.push({ value: slot, type: attr.type, path: `${path}.${attr.name}` });
        });
        break;
      }

      default:
        if (SCALAR_TAGS[t.kind] !== v.tag) throw mismatch();
    }
  }
}
