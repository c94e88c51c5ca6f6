// src/core/construct/builder.ts
// Object allocation and state restoration.

import { MalformedArchiveError, MissingAttributeError } from "../errors";
import type { RestoreContext, TypeDescriptor } from "../types/descriptor";
import type { TypeResolver } from "../types/resolver";
import { ObjectInstance } from "../values/object";
import type { TaggedValue } from "../values/values";
import { describeValue, dictGetStr } from "../values/values";
import { reconcileTypeTags } from "./reconcile";
import { withSpecializationDisabled } from "./specialization";
import { validateInstance } from "./validate";

/**
 * Allocation is split from restoration so the interpreter can register an
 * instance as a backreference before its state is read.
 */
export interface InstanceBuilder {
  /** New instance with every slot empty */
  allocate(type: TypeDescriptor): ObjectInstance;
  /** Populate an allocated instance from its recorded state */
  restore(instance: ObjectInstance, state: TaggedValue): void;
}

export class DefaultInstanceBuilder implements InstanceBuilder {
  private readonly context: RestoreContext;

  constructor(private readonly resolver: TypeResolver) {
    this.context = {
      resolve: name => this.resolver.resolve(name),
      construct: (name, state) => this.construct(name, state),
    };
  }

  allocate(type: TypeDescriptor): ObjectInstance {
    return new ObjectInstance(type);
  }

  restore(instance: ObjectInstance, state: TaggedValue): void {
    const { type } = instance;
    switch (type.strategy.kind) {
      case "restore": {
        const { stateType, restore } = type.strategy;
        reconcileTypeTags(state, stateType, type.qualifiedName);
        withSpecializationDisabled(() => restore(instance, state, this.context));
        validateInstance(instance);
        return;
      }
      case "fields":
        assignFields(instance, state);
        return;
    }
  }

  /**
   * Resolve, allocate and restore in one step; used for construction that
   * restoration methods request themselves.
   */
  construct(qualifiedName: string, state: TaggedValue): ObjectInstance {
    const instance = this.allocate(this.resolver.resolve(qualifiedName));
    this.restore(instance, state);
    return instance;
  }
}

/**
 * Default path: state is a dict from attribute name to value, consumed in
 * declaration order.
 */
function assignFields(instance: ObjectInstance, state: TaggedValue): void {
  const { type } = instance;
  if (state.tag !== "Dict") {
    throw new MalformedArchiveError(`state must be a dict of attributes, got ${describeValue(state)}`, {
      typeName: type.qualifiedName,
    });
  }
  for (let i = 0; i < type.attributes.length; i++) {
    const name = type.attributes[i].name;
    const value = dictGetStr(state, name);
    if (value === undefined) {
      throw new MissingAttributeError(name, type.qualifiedName);
    }
    instance.setSlot(i, value);
  }
}
