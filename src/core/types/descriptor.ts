// src/core/types/descriptor.ts
// Resolved schema of a named type: attributes plus construction strategy.

import type { TypeExpr } from "./typeExpr";
import { isOptional, toTypeExpr } from "./typeExpr";
import type { ObjectInstance } from "../values/object";
import type { TaggedValue } from "../values/values";

export interface AttributeDef {
  name: string;
  type: TypeExpr;
  optional: boolean;
}

/**
 * Services available to a restoration method while it runs.
 */
export interface RestoreContext {
  /** Resolve a type within the current load session */
  resolve(qualifiedName: string): TypeDescriptor;
  /** Build and restore a nested instance from a state value */
  construct(qualifiedName: string, state: TaggedValue): ObjectInstance;
}

export type RestoreMethod = (self: ObjectInstance, state: TaggedValue, ctx: RestoreContext) => void;

/**
 * Chosen once when the type is defined; never re-checked per attribute.
 */
export type ConstructionStrategy =
  | { kind: "restore"; stateType: TypeExpr; restore: RestoreMethod }
  | { kind: "fields" };

export class TypeDescriptor {
  private readonly indexByName: Map<string, number>;

  constructor(
    readonly qualifiedName: string,
    readonly attributes: readonly AttributeDef[],
    readonly strategy: ConstructionStrategy
  ) {
    this.indexByName = new Map(attributes.map((a, i) => [a.name, i]));
    if (this.indexByName.size !== attributes.length) {
      throw new Error(`Type ${qualifiedName} declares an attribute twice`);
    }
  }

  attributeIndex(name: string): number | undefined {
    return this.indexByName.get(name);
  }
}

export type TypeDefinition = {
  name: string;
  attributes: Array<{ name: string; type: TypeExpr | string }>;
  /** Restoration method and the declared type of its state parameter */
  restore?: { stateType: TypeExpr | string; method: RestoreMethod };
};

export function defineType(def: TypeDefinition): TypeDescriptor {
  const attributes = def.attributes.map(a => {
    const type = toTypeExpr(a.type);
    return { name: a.name, type, optional: isOptional(type) };
  });
  const strategy: ConstructionStrategy = def.restore
    ? { kind: "restore", stateType: toTypeExpr(def.restore.stateType), restore: def.restore.method }
    : { kind: "fields" };
  return new TypeDescriptor(def.name, attributes, strategy);
}
