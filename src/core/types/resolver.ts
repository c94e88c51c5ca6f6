// src/core/types/resolver.ts
// Per-session memoized type resolution.

import { UnresolvedTypeError } from "../errors";
import type { TypeDescriptor } from "./descriptor";
import type { TypeLoader } from "./registry";

export interface TypeResolver {
  resolve(qualifiedName: string): TypeDescriptor;
}

/**
 * Loads each name at most once per session and hands back the same
 * descriptor instance on every later request.
 */
export class ClassResolver implements TypeResolver {
  private readonly cache = new Map<string, TypeDescriptor>();
  private readonly loading = new Set<string>();

  constructor(private readonly loader: TypeLoader) {}

  resolve(qualifiedName: string): TypeDescriptor {
    const cached = this.cache.get(qualifiedName);
    if (cached) return cached;

    if (this.loading.has(qualifiedName)) {
      throw new UnresolvedTypeError(qualifiedName, "type is already being loaded (circular load)");
    }

    this.loading.add(qualifiedName);
    let descriptor: TypeDescriptor | undefined;
    try {
      descriptor = this.loader.load(qualifiedName);
    } catch (err) {
      throw new UnresolvedTypeError(qualifiedName, "type loader failed", err);
    } finally {
      this.loading.delete(qualifiedName);
    }

    if (!descriptor) {
      throw new UnresolvedTypeError(qualifiedName, "unknown type");
    }
    if (descriptor.qualifiedName !== qualifiedName) {
      throw new UnresolvedTypeError(
        qualifiedName,
        `type loader returned a descriptor named '${descriptor.qualifiedName}'`
      );
    }

    this.cache.set(qualifiedName, descriptor);
    return descriptor;
  }

  /** Types bound so far in this session */
  loadedTypes(): ReadonlyMap<string, TypeDescriptor> {
    return this.cache;
  }
}
