// src/core/types/typeExpr.ts
// Declared types of attributes and restoration-method state parameters.

export type TypeExpr =
  | { kind: "Any" }
  | { kind: "None" }
  | { kind: "Bool" }
  | { kind: "Int" }
  | { kind: "Float" }
  | { kind: "Str" }
  | { kind: "Tensor" }
  | { kind: "List"; element: TypeExpr }
  | { kind: "Tuple"; elements: TypeExpr[] }
  | { kind: "Dict"; key: TypeExpr; value: TypeExpr }
  | { kind: "Optional"; inner: TypeExpr }
  | { kind: "Class"; name: string };

export const AnyType: TypeExpr = { kind: "Any" };
export const NoneType: TypeExpr = { kind: "None" };
export const BoolType: TypeExpr = { kind: "Bool" };
export const IntType: TypeExpr = { kind: "Int" };
export const FloatType: TypeExpr = { kind: "Float" };
export const StrType: TypeExpr = { kind: "Str" };
export const TensorType: TypeExpr = { kind: "Tensor" };

export const listOf = (element: TypeExpr): TypeExpr => ({ kind: "List", element });
export const tupleOf = (...elements: TypeExpr[]): TypeExpr => ({ kind: "Tuple", elements });
export const dictOf = (key: TypeExpr, value: TypeExpr): TypeExpr => ({ kind: "Dict", key, value });
export const optionalOf = (inner: TypeExpr): TypeExpr => ({ kind: "Optional", inner });
export const classOf = (name: string): TypeExpr => ({ kind: "Class", name });

export function isOptional(t: TypeExpr): boolean {
  return t.kind === "Optional";
}

/**
 * Structural equality of two type expressions.
 */
export function typeEquals(a: TypeExpr, b: TypeExpr): boolean {
  switch (a.kind) {
    case "List":
      return b.kind === "List" && typeEquals(a.element, b.element);
    case "Tuple":
      return (
        b.kind === "Tuple" &&
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => typeEquals(el, b.elements[i]))
      );
    case "Dict":
      return b.kind === "Dict" && typeEquals(a.key, b.key) && typeEquals(a.value, b.value);
    case "Optional":
      return b.kind === "Optional" && typeEquals(a.inner, b.inner);
    case "Class":
      return b.kind === "Class" && a.name === b.name;
    default:
      return a.kind === b.kind;
  }
}

/**
 * Render a type the way it is written in type definitions.
 */
export function renderType(t: TypeExpr): string {
  switch (t.kind) {
    case "Any": return "Any";
    case "None": return "None";
    case "Bool": return "bool";
    case "Int": return "int";
    case "Float": return "float";
    case "Str": return "str";
    case "Tensor": return "Tensor";
    case "List": return `List[${renderType(t.element)}]`;
    case "Tuple": return `Tuple[${t.elements.map(renderType).join(", ")}]`;
    case "Dict": return `Dict[${renderType(t.key)}, ${renderType(t.value)}]`;
    case "Optional": return `Optional[${renderType(t.inner)}]`;
    case "Class": return t.name;
  }
}

// ─────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────

type TypeTok =
  | { tag: "Name"; s: string }
  | { tag: "LBracket" }
  | { tag: "RBracket" }
  | { tag: "Comma" };

function tokenizeType(src: string): TypeTok[] {
  const toks: TypeTok[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i];
    if (c === " " || c === "\t") { i++; continue; }
    if (c === "[") { toks.push({ tag: "LBracket" }); i++; continue; }
    if (c === "]") { toks.push({ tag: "RBracket" }); i++; continue; }
    if (c === ",") { toks.push({ tag: "Comma" }); i++; continue; }

    let s = "";
    while (i < src.length && !" \t[],".includes(src[i])) {
      s += src[i];
      i++;
    }
    toks.push({ tag: "Name", s });
  }
  return toks;
}

const SCALARS = new Map<string, TypeExpr>([
  ["Any", AnyType],
  ["None", NoneType],
  ["bool", BoolType],
  ["int", IntType],
  ["float", FloatType],
  ["str", StrType],
  ["Tensor", TensorType],
]);

/**
 * Parse a textual type such as `Dict[str, List[Optional[int]]]`.
 * Names that are not builtin scalars or generics become class types.
 */
export function parseType(src: string): TypeExpr {
  const toks = tokenizeType(src);
  let pos = 0;

  const fail = (why: string): never => {
    throw new Error(`Invalid type '${src}': ${why}`);
  };

  const expect = (tag: TypeTok["tag"]): void => {
    const tok = toks[pos];
    if (!tok || tok.tag !== tag) fail(`expected ${tag} at token ${pos}`);
    pos++;
  };

  const parseArgs = (): TypeExpr[] => {
    expect("LBracket");
    const args: TypeExpr[] = [];
    if (toks[pos]?.tag === "RBracket") {
      pos++;
      return args;
    }
    args.push(parseOne());
    while (toks[pos]?.tag === "Comma") {
      pos++;
      args.push(parseOne());
    }
    expect("RBracket");
    return args;
  };

  const arity = (name: string, args: TypeExpr[], n: number): TypeExpr[] =>
    args.length === n ? args : fail(`${name} takes ${n} argument(s), got ${args.length}`);

  const parseOne = (): TypeExpr => {
    const tok = toks[pos];
    if (!tok || tok.tag !== "Name") return fail(`expected a type name at token ${pos}`);
    pos++;

    switch (tok.s) {
      case "List": {
        const [element] = arity("List", parseArgs(), 1);
        return listOf(element);
      }
      case "Tuple":
        return tupleOf(...parseArgs());
      case "Dict": {
        const [key, value] = arity("Dict", parseArgs(), 2);
        return dictOf(key, value);
      }
      case "Optional": {
        const [inner] = arity("Optional", parseArgs(), 1);
        return optionalOf(inner);
      }
      default:
        return SCALARS.get(tok.s) ?? classOf(tok.s);
    }
  };

  const result = parseOne();
  if (pos !== toks.length) fail("trailing tokens");
  return result;
}

/**
 * Accept either a parsed type or its textual form.
 */
export function toTypeExpr(t: TypeExpr | string): TypeExpr {
  return typeof t === "string" ? parseType(t) : t;
}
