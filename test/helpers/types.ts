// test/helpers/types.ts
// Type definitions and loaders shared by the specs.

import type { TypeDefinition, TypeDescriptor } from "../../src/core/types/descriptor";
import type { TypeLoader } from "../../src/core/types/registry";
import { TypeRegistry } from "../../src/core/types/registry";
import type { PickleWriter } from "./pickle";

/** Restored from a (first, second) tuple */
export const pairType: TypeDefinition = {
  name: "demo.Pair",
  attributes: [
    { name: "first", type: "int" },
    { name: "second", type: "str" },
  ],
  restore: {
    stateType: "Tuple[int, str]",
    method: (self, state) => {
      if (state.tag !== "Tuple") throw new Error(`demo.Pair state is ${state.tag}`);
      const [first, second] = state.items;
      self.setAttr("first", first);
      self.setAttr("second", second);
    },
  },
};

/** Restoration method that only ever sets `first` */
export const halfType: TypeDefinition = {
  name: "demo.Half",
  attributes: [
    { name: "first", type: "int" },
    { name: "second", type: "str" },
  ],
  restore: {
    stateType: "int",
    method: (self, state) => {
      self.setAttr("first", state);
    },
  },
};

/** Two list fields assigned by name */
export const holderType: TypeDefinition = {
  name: "demo.Holder",
  attributes: [
    { name: "a", type: "List[int]" },
    { name: "b", type: "List[int]" },
  ],
};

export const boxType: TypeDefinition = {
  name: "demo.Box",
  attributes: [{ name: "items", type: "List[demo.Pair]" }],
};

export const nodeType: TypeDefinition = {
  name: "demo.Node",
  attributes: [
    { name: "label", type: "str" },
    { name: "next", type: "Optional[demo.Node]" },
  ],
};

export function demoRegistry(...extra: TypeDefinition[]): TypeRegistry {
  const registry = new TypeRegistry();
  for (const def of [pairType, halfType, holderType, boxType, nodeType, ...extra]) {
    registry.register(def);
  }
  return registry;
}

/**
 * Loader that records every name it is asked for.
 */
export function countingLoader(inner: TypeLoader): TypeLoader & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    load(qualifiedName: string): TypeDescriptor | undefined {
      calls.push(qualifiedName);
      return inner.load(qualifiedName);
    },
  };
}

/** demo.Pair instance registered under `id` */
export function writePair(w: PickleWriter, id: number, first: number, second: string): PickleWriter {
  return w.object("demo.Pair", id, s => s.int(first).str(second).tuple(2));
}
