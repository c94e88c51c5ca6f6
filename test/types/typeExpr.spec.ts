import { describe, expect, it } from "vitest";
import {
  IntType,
  StrType,
  TensorType,
  classOf,
  dictOf,
  listOf,
  optionalOf,
  parseType,
  renderType,
  tupleOf,
  typeEquals,
} from "../../src/core/types/typeExpr";

describe("parseType", () => {
  it("parses nested generics", () => {
    expect(parseType("Dict[str, List[Optional[int]]]")).toEqual(dictOf(StrType, listOf(optionalOf(IntType))));
  });

  it("parses tuples of any length", () => {
    expect(parseType("Tuple[]")).toEqual(tupleOf());
    expect(parseType("Tuple[int, Tensor]")).toEqual(tupleOf(IntType, TensorType));
  });

  it("treats unknown names as classes", () => {
    expect(parseType("Optional[demo.Node]")).toEqual(optionalOf(classOf("demo.Node")));
    expect(parseType("constructor")).toEqual(classOf("constructor"));
  });

  it("rejects malformed input", () => {
    expect(() => parseType("List[int")).toThrow("Invalid type 'List[int': expected RBracket at token 3");
    expect(() => parseType("Dict[int]")).toThrow("Dict takes 2 argument(s), got 1");
    expect(() => parseType("int int")).toThrow("trailing tokens");
  });
});

describe("renderType", () => {
  it("renders the way types are written", () => {
    expect(renderType(parseType("Dict[str,Tuple[int,  float]]"))).toBe("Dict[str, Tuple[int, float]]");
    expect(renderType(optionalOf(classOf("demo.Node")))).toBe("Optional[demo.Node]");
  });
});

describe("typeEquals", () => {
  it("compares structurally", () => {
    expect(typeEquals(parseType("List[int]"), listOf(IntType))).toBe(true);
    expect(typeEquals(parseType("List[int]"), listOf(StrType))).toBe(false);
    expect(typeEquals(tupleOf(IntType), tupleOf(IntType, IntType))).toBe(false);
    expect(typeEquals(classOf("a.A"), classOf("a.B"))).toBe(false);
  });
});
