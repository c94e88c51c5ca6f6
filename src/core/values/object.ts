// src/core/values/object.ts

import type { TypeDescriptor } from "../types/descriptor";
import type { TaggedValue } from "./values";

/**
 * Instance of a resolved type: one slot per declared attribute, empty until
 * restoration fills it. Shared by every backreference that points at it.
 */
export class ObjectInstance {
  readonly slots: Array<TaggedValue | undefined>;

  constructor(readonly type: TypeDescriptor) {
    this.slots = new Array<TaggedValue | undefined>(type.attributes.length).fill(undefined);
  }

  getSlot(index: number): TaggedValue | undefined {
    this.checkIndex(index);
    return this.slots[index];
  }

  setSlot(index: number, value: TaggedValue): void {
    this.checkIndex(index);
    this.slots[index] = value;
  }

  getAttr(name: string): TaggedValue | undefined {
    return this.slots[this.indexOf(name)];
  }

  setAttr(name: string, value: TaggedValue): void {
    this.slots[this.indexOf(name)] = value;
  }

  private indexOf(name: string): number {
    const index = this.type.attributeIndex(name);
    if (index === undefined) {
      throw new Error(`${this.type.qualifiedName} has no attribute '${name}'`);
    }
    return index;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.slots.length) {
      throw new RangeError(`Slot ${index} out of range for ${this.type.qualifiedName}`);
    }
  }
}
