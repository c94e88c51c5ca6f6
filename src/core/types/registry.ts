// src/core/types/registry.ts
// Type definitions known to the host program, looked up by qualified name.

import type { TypeDefinition } from "./descriptor";
import { TypeDescriptor, defineType } from "./descriptor";
import type { TypeExpr } from "./typeExpr";

/**
 * Produces the descriptor for a qualified type name, or undefined when the
 * name is unknown. How definitions are obtained is up to the implementation.
 */
export interface TypeLoader {
  load(qualifiedName: string): TypeDescriptor | undefined;
}

/**
 * In-process registry of type descriptors.
 */
export class TypeRegistry implements TypeLoader {
  private descriptors: Map<string, TypeDescriptor> = new Map();

  /**
   * Register a descriptor or definition. Throws on duplicate names.
   */
  register(def: TypeDescriptor | TypeDefinition): TypeDescriptor {
    const descriptor = def instanceof TypeDescriptor ? def : defineType(def);
    if (this.descriptors.has(descriptor.qualifiedName)) {
      throw new Error(`Type already registered: ${descriptor.qualifiedName}`);
    }
    this.descriptors.set(descriptor.qualifiedName, descriptor);
    return descriptor;
  }

  load(qualifiedName: string): TypeDescriptor | undefined {
    return this.descriptors.get(qualifiedName);
  }

  has(qualifiedName: string): boolean {
    return this.descriptors.has(qualifiedName);
  }

  getAll(): TypeDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  /**
   * Check that class-typed attributes and state types refer to registered types.
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const desc of this.descriptors.values()) {
      for (const attr of desc.attributes) {
        for (const name of classNames(attr.type)) {
          if (!this.descriptors.has(name)) {
            errors.push(`${desc.qualifiedName}.${attr.name}: unknown type ${name}`);
          }
        }
      }
      if (desc.strategy.kind === "restore") {
        for (const name of classNames(desc.strategy.stateType)) {
          if (!this.descriptors.has(name)) {
            errors.push(`${desc.qualifiedName}: restore state refers to unknown type ${name}`);
          }
        }
      }
    }

    return { valid: errors.length === 0, errors };
  }
}

function classNames(t: TypeExpr): string[] {
  switch (t.kind) {
    case "Class": return [t.name];
    case "List": return classNames(t.element);
    case "Optional": return classNames(t.inner);
    case "Tuple": return t.elements.flatMap(classNames);
    case "Dict": return [...classNames(t.key), ...classNames(t.value)];
    default: return [];
  }
}
