// src/core/construct/validate.ts

import { UninitializedAttributeError } from "../errors";
import { renderType } from "../types/typeExpr";
import type { ObjectInstance } from "../values/object";

/**
 * Every non-optional attribute must hold a value once restoration is done.
 * A None in a non-optional slot counts as uninitialized.
 */
export function validateInstance(instance: ObjectInstance): void {
  const { type } = instance;
  type.attributes.forEach((attr, i) => {
    if (attr.optional) return;
    const slot = instance.slots[i];
    if (slot === undefined || slot.tag === "None") {
      throw new UninitializedAttributeError(attr.name, renderType(attr.type), type.qualifiedName);
    }
  });
}
