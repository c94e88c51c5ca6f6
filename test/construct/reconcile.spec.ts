import { describe, expect, it } from "vitest";
import { narrowTag, reconcileTypeTags } from "../../src/core/construct/reconcile";
import { TypeReconciliationError } from "../../src/core/errors";
import { defineType } from "../../src/core/types/descriptor";
import {
  AnyType,
  FloatType,
  IntType,
  StrType,
  dictOf,
  listOf,
  parseType,
  tupleOf,
} from "../../src/core/types/typeExpr";
import { ObjectInstance } from "../../src/core/values/object";
import { VNone, vdict, vint, vlist, vobject, vstr, vtuple } from "../../src/core/values/values";

describe("narrowTag", () => {
  it("replaces Any with the declared type", () => {
    expect(narrowTag(AnyType, IntType)).toEqual(IntType);
    expect(narrowTag(listOf(AnyType), listOf(IntType))).toEqual(listOf(IntType));
  });

  it("keeps precise tags that agree", () => {
    expect(narrowTag(IntType, AnyType)).toEqual(IntType);
    expect(narrowTag(dictOf(StrType, AnyType), dictOf(StrType, FloatType))).toEqual(dictOf(StrType, FloatType));
  });

  it("returns undefined on disagreement", () => {
    expect(narrowTag(IntType, StrType)).toBeUndefined();
    expect(narrowTag(listOf(IntType), listOf(StrType))).toBeUndefined();
    expect(narrowTag(tupleOf(IntType), tupleOf(IntType, IntType))).toBeUndefined();
  });
});

describe("reconcileTypeTags", () => {
  it("narrows nested list and dict tags in place", () => {
    const inner = vlist([vint(1)]);
    const state = vdict([[vstr("xs"), inner]]);

    reconcileTypeTags(state, parseType("Dict[str, List[int]]"));

    expect(state.keyType).toEqual(StrType);
    expect(state.valueType).toEqual(listOf(IntType));
    expect(inner.elementType).toEqual(IntType);
  });

  it("accepts None for optional types", () => {
    expect(() => reconcileTypeTags(vtuple([VNone, vint(2)]), parseType("Tuple[Optional[int], int]"))).not.toThrow();
  });

  it("reports the path of a mismatch", () => {
    const state = vdict([[vstr("xs"), vlist([vint(1), vstr("two")])]]);

    expect(() => reconcileTypeTags(state, parseType("Dict[str, List[int]]"), "demo.Scores")).toThrow(
      "Recorded state at state[s:xs][1] is a String, which does not fit declared type 'int' (restoring 'demo.Scores')"
    );
  });

  it("rejects tuples of the wrong length", () => {
    expect(() => reconcileTypeTags(vtuple([vint(1)]), parseType("Tuple[int, int]"))).toThrow(TypeReconciliationError);
  });

  it("rejects a list already tagged with another element type", () => {
    expect(() => reconcileTypeTags(vlist([], StrType), listOf(IntType))).toThrow(
      "Recorded state at state is a List(0), which does not fit declared type 'List[int]'"
    );
  });

  it("visits cyclic objects once", () => {
    const node = defineType({
      name: "demo.Node",
      attributes: [
        { name: "label", type: "str" },
        { name: "next", type: "Optional[demo.Node]" },
      ],
    });
    const instance = new ObjectInstance(node);
    instance.setAttr("label", vstr("loop"));
    instance.setAttr("next", vobject(instance));

    expect(() => reconcileTypeTags(vobject(instance), parseType("demo.Node"))).not.toThrow();
  });

  it("rejects an object of another type", () => {
    const other = new ObjectInstance(defineType({ name: "demo.Other", attributes: [] }));

    expect(() => reconcileTypeTags(vobject(other), parseType("demo.Node"))).toThrow(
      "Recorded state at state is a Object(demo.Other), which does not fit declared type 'demo.Node'"
    );
  });
});
