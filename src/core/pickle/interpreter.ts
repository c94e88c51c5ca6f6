// src/core/pickle/interpreter.ts
// Stack machine over one archive's instruction stream.

import type { PullReader } from "../archive/source";
import { ByteCursor } from "../archive/source";
import type { InstanceBuilder } from "../construct/builder";
import { MalformedArchiveError } from "../errors";
import type { TypeResolver } from "../types/resolver";
import type { ObjectInstance } from "../values/object";
import type { Storage, TensorMaterializer } from "../values/tensor";
import { DTYPE_BYTES, defaultMaterializer } from "../values/tensor";
import type { DictValue, ListValue, TaggedValue } from "../values/values";
import {
  VFalse,
  VNone,
  VTrue,
  describeValue,
  dictKey,
  dictSet,
  vdict,
  vfloat,
  vint,
  vlist,
  vobject,
  vstr,
  vtuple,
} from "../values/values";
import type { BuiltinContext, StackItem } from "./globals";
import { isInternal, lookupBuiltin } from "./globals";
import { BackreferenceTable } from "./memo";
import { MAX_PROTOCOL, Op, opName } from "./opcodes";

export type UnpicklerOptions = {
  /** Archive name, used for diagnostics */
  archive: string;
  source: PullReader;
  resolver: TypeResolver;
  builder: InstanceBuilder;
  /** Bytes of an auxiliary record, by name relative to the archive */
  readRecord: (name: string) => Uint8Array;
  materializer?: TensorMaterializer;
  /** Device every tensor is placed on, overriding recorded locations */
  device?: string;
  maxStackDepth?: number;
};

export const DEFAULT_MAX_STACK_DEPTH = 1_000_000;

const isValue = (item: StackItem): item is TaggedValue => !isInternal(item);

/**
 * Decodes a single archive. Construct one per archive read; parse() may
 * only be called once.
 */
export class Unpickler {
  private readonly cursor: ByteCursor;
  private readonly stack: StackItem[] = [];
  private readonly marks: number[] = [];
  private readonly memo = new BackreferenceTable<StackItem>();
  private readonly storages = new Map<string, Storage>();
  /** Allocated by NEWOBJ, waiting for their BUILD */
  private readonly unbuilt = new Set<ObjectInstance>();
  private readonly builtinCtx: BuiltinContext;
  private readonly maxStackDepth: number;
  private opOffset = 0;
  private used = false;

  constructor(private readonly options: UnpicklerOptions) {
    this.cursor = new ByteCursor(options.source, options.archive);
    this.maxStackDepth = options.maxStackDepth ?? DEFAULT_MAX_STACK_DEPTH;
    this.builtinCtx = {
      materializer: options.materializer ?? defaultMaterializer,
      device: options.device,
      fail: detail => this.fail(detail),
    };
  }

  parse(): TaggedValue {
    if (this.used) {
      throw new Error(`Unpickler for archive '${this.options.archive}' has already been used`);
    }
    this.used = true;

    for (;;) {
      this.opOffset = this.cursor.offset;
      const code = this.cursor.tryU8();
      if (code === undefined) this.fail("stream ended without STOP");
      if (code === Op.STOP) break;
      this.step(code);
      if (this.stack.length > this.maxStackDepth) {
        this.fail(`stack depth exceeds ${this.maxStackDepth}`);
      }
    }

    if (this.marks.length > 0) this.fail("MARK left open at STOP");
    const [pending] = this.unbuilt;
    if (pending) this.fail(`object of type ${pending.type.qualifiedName} was allocated but never built`);
    if (this.stack.length !== 1) this.fail(`expected one value at STOP, found ${this.stack.length}`);
    return this.asValue(this.stack[0], "root value");
  }

  // ─────────────────────────────────────────────────────────────────
  // Dispatch
  // ─────────────────────────────────────────────────────────────────

  private step(code: number): void {
    const c = this.cursor;
    switch (code) {
      case Op.PROTO: {
        const version = c.u8();
        if (version > MAX_PROTOCOL) this.fail(`unsupported protocol ${version}`);
        return;
      }
      case Op.MARK:
        this.marks.push(this.stack.length);
        return;
      case Op.POP:
        this.pop();
        return;
      case Op.POP_MARK:
        this.popMark();
        return;
      case Op.DUP:
        this.push(this.peek());
        return;

      // Scalars
      case Op.NONE: this.push(VNone); return;
      case Op.NEWTRUE: this.push(VTrue); return;
      case Op.NEWFALSE: this.push(VFalse); return;
      case Op.BININT: this.push(vint(c.i32le())); return;
      case Op.BININT1: this.push(vint(c.u8())); return;
      case Op.BININT2: this.push(vint(c.u16le())); return;
      case Op.LONG1: this.push(vint(c.signedLE(c.u8()))); return;
      case Op.LONG4: {
        const n = c.i32le();
        if (n < 0) this.fail("LONG4 with negative byte count");
        this.push(vint(c.signedLE(n)));
        return;
      }
      case Op.BINFLOAT: this.push(vfloat(c.f64be())); return;
      case Op.BINUNICODE: this.push(vstr(c.utf8(c.u32le()))); return;
      case Op.SHORT_BINUNICODE: this.push(vstr(c.utf8(c.u8()))); return;

      // Lists
      case Op.EMPTY_LIST:
        this.push(vlist([]));
        return;
      case Op.APPEND: {
        const value = this.popValue("list element");
        this.peekList().items.push(value);
        return;
      }
      case Op.APPENDS: {
        const items = this.popMarkValues("list element");
        this.peekList().items.push(...items);
        return;
      }
      case Op.LIST:
        this.push(vlist(this.popMarkValues("list element")));
        return;

      // Tuples
      case Op.EMPTY_TUPLE: this.push(vtuple([])); return;
      case Op.TUPLE: this.push(this.makeTuple(this.popMark())); return;
      case Op.TUPLE1: this.push(this.makeTuple(this.popN(1))); return;
      case Op.TUPLE2: this.push(this.makeTuple(this.popN(2))); return;
      case Op.TUPLE3: this.push(this.makeTuple(this.popN(3))); return;

      // Dicts
      case Op.EMPTY_DICT:
        this.push(vdict());
        return;
      case Op.SETITEM: {
        const value = this.popValue("dict value");
        const key = this.popValue("dict key");
        this.setEntry(this.peekDict(), key, value);
        return;
      }
      case Op.SETITEMS: {
        const items = this.popMarkValues("dict entry");
        this.setEntries(this.peekDict(), items);
        return;
      }
      case Op.DICT: {
        const items = this.popMarkValues("dict entry");
        const dict = vdict();
        this.setEntries(dict, items);
        this.push(dict);
        return;
      }

      // Backreferences
      case Op.BINPUT: this.memoPut(c.u8()); return;
      case Op.LONG_BINPUT: this.memoPut(c.u32le()); return;
      case Op.MEMOIZE: this.memo.push(this.peek()); return;
      case Op.BINGET: this.push(this.memoGet(c.u8())); return;
      case Op.LONG_BINGET: this.push(this.memoGet(c.u32le())); return;

      // Globals and construction
      case Op.GLOBAL: {
        const moduleName = c.line();
        const name = c.line();
        const builtin = lookupBuiltin(moduleName, name);
        this.push(builtin ?? { tag: "ClassRef", type: this.options.resolver.resolve(`${moduleName}.${name}`) });
        return;
      }
      case Op.REDUCE: {
        const args = this.tupleItems(this.pop(), "REDUCE arguments");
        const callable = this.pop();
        if (callable.tag !== "FunctionRef") {
          this.fail(`REDUCE on ${this.describe(callable)}; objects are built with NEWOBJ and BUILD`);
        }
        this.push(callable.call(args, this.builtinCtx));
        return;
      }
      case Op.NEWOBJ: {
        const args = this.tupleItems(this.pop(), "NEWOBJ arguments");
        const cls = this.pop();
        if (cls.tag !== "ClassRef") this.fail(`NEWOBJ on ${this.describe(cls)}`);
        if (args.length !== 0) this.fail(`NEWOBJ for ${cls.type.qualifiedName} with ${args.length} arguments`);
        const instance = this.options.builder.allocate(cls.type);
        this.unbuilt.add(instance);
        this.push(vobject(instance));
        return;
      }
      case Op.BUILD: {
        const state = this.popValue("object state");
        const target = this.peek();
        if (target.tag !== "Object") this.fail(`BUILD on ${this.describe(target)}`);
        if (!this.unbuilt.delete(target.object)) {
          this.fail(`BUILD on ${target.object.type.qualifiedName}, which is already built`);
        }
        this.options.builder.restore(target.object, state);
        return;
      }
      case Op.BINPERSID:
        this.push(this.loadStorage(this.pop()));
        return;

      default:
        this.fail(`unknown opcode ${opName(code)}`);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Stack helpers
  // ─────────────────────────────────────────────────────────────────

  private fail(detail: string): never {
    throw new MalformedArchiveError(detail, { archive: this.options.archive, offset: this.opOffset });
  }

  private push(item: StackItem): void {
    this.stack.push(item);
  }

  private pop(): StackItem {
    const item = this.stack.pop();
    if (item === undefined) return this.fail("stack underflow");
    return item;
  }

  private peek(): StackItem {
    if (this.stack.length === 0) return this.fail("stack underflow");
    return this.stack[this.stack.length - 1];
  }

  private popN(n: number): StackItem[] {
    if (this.stack.length < n) this.fail("stack underflow");
    return this.stack.splice(this.stack.length - n, n);
  }

  private popMark(): StackItem[] {
    const mark = this.marks.pop();
    if (mark === undefined) return this.fail("no MARK on the stack");
    if (mark > this.stack.length) this.fail("stack underflow below MARK");
    return this.stack.splice(mark);
  }

  private popValue(what: string): TaggedValue {
    return this.asValue(this.pop(), what);
  }

  private popMarkValues(what: string): TaggedValue[] {
    return this.popMark().map(item => this.asValue(item, what));
  }

  private asValue(item: StackItem, what: string): TaggedValue {
    if (isInternal(item)) this.fail(`${what} is ${this.describe(item)}, not a value`);
    return item;
  }

  private peekList(): ListValue {
    const top = this.peek();
    if (top.tag !== "List") return this.fail(`append to ${this.describe(top)}`);
    return top;
  }

  private peekDict(): DictValue {
    const top = this.peek();
    if (top.tag !== "Dict") return this.fail(`set item on ${this.describe(top)}`);
    return top;
  }

  private makeTuple(items: StackItem[]): StackItem {
    return items.every(isValue) ? vtuple(items) : { tag: "RawTuple", items };
  }

  private tupleItems(item: StackItem, what: string): StackItem[] {
    if (item.tag === "Tuple" || item.tag === "RawTuple") return item.items;
    return this.fail(`${what} must be a tuple, got ${this.describe(item)}`);
  }

  private setEntry(dict: DictValue, key: TaggedValue, value: TaggedValue): void {
    if (dictKey(key) === undefined) this.fail(`unhashable dict key ${describeValue(key)}`);
    dictSet(dict, key, value);
  }

  private setEntries(dict: DictValue, items: TaggedValue[]): void {
    if (items.length % 2 !== 0) this.fail("odd number of items for dict entries");
    for (let i = 0; i < items.length; i += 2) {
      this.setEntry(dict, items[i], items[i + 1]);
    }
  }

  private memoPut(id: number): void {
    if (!this.memo.put(id, this.peek())) {
      this.fail(`backreference id ${id} out of order; next id is ${this.memo.nextId}`);
    }
  }

  private memoGet(id: number): StackItem {
    const item = this.memo.get(id);
    if (item === undefined) return this.fail(`undefined backreference id ${id}`);
    return item;
  }

  private describe(item: StackItem): string {
    switch (item.tag) {
      case "ClassRef": return `class ${item.type.qualifiedName}`;
      case "FunctionRef": return `function ${item.name}`;
      case "DTypeRef": return `storage type ${item.dtype}`;
      case "StorageRef": return `storage '${item.storage.key}'`;
      case "RawTuple": return `Tuple(${item.items.length}) holding references`;
      default: return describeValue(item);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Storages
  // ─────────────────────────────────────────────────────────────────

  /**
   * Persistent id ("storage", dtype, key, location, numel) names a raw
   * buffer record inside this archive. Each record is read once.
   */
  private loadStorage(pid: StackItem): StackItem {
    const [kind, dtype, key, location, numel] = this.tupleItems(pid, "persistent id");
    if (kind?.tag !== "String" || kind.value !== "storage") this.fail("persistent id must start with 'storage'");
    if (dtype?.tag !== "DTypeRef") this.fail("persistent id must name a storage type");
    if (key?.tag !== "String") this.fail("persistent id must carry a record key");
    if (location?.tag !== "String") this.fail("persistent id must carry a location");
    if (numel?.tag !== "Int" || numel.value < 0n) this.fail("persistent id must carry an element count");

    const count = Number(numel.value);
    const cached = this.storages.get(key.value);
    if (cached) {
      if (cached.dtype !== dtype.dtype) {
        this.fail(`storage '${key.value}' read as ${dtype.dtype}, earlier as ${cached.dtype}`);
      }
      return { tag: "StorageRef", storage: cached };
    }

    const bytes = this.options.readRecord(key.value);
    const needed = count * DTYPE_BYTES[dtype.dtype];
    if (bytes.byteLength < needed) {
      this.fail(`storage '${key.value}' holds ${bytes.byteLength} bytes, needs ${needed}`);
    }
    const storage: Storage = { key: key.value, dtype: dtype.dtype, location: location.value, numel: count, bytes };
    this.storages.set(key.value, storage);
    return { tag: "StorageRef", storage };
  }
}
