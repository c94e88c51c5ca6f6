// src/core/pickle/memo.ts
// Backreference table for one archive read.

/**
 * Dense id → value table. Ids are assigned in read order starting at 0 and
 * entries are never removed, so a value is addressable from the moment it
 * is registered, before its state has been restored.
 */
export class BackreferenceTable<T> {
  private readonly entries: T[] = [];

  get size(): number {
    return this.entries.length;
  }

  /** Id the next registration must use */
  get nextId(): number {
    return this.entries.length;
  }

  /**
   * Register under an explicit id. Returns false when the id is not the
   * next one in sequence.
   */
  put(id: number, value: T): boolean {
    if (id !== this.entries.length) return false;
    this.entries.push(value);
    return true;
  }

  /** Register under the next id and return it */
  push(value: T): number {
    this.entries.push(value);
    return this.entries.length - 1;
  }

  get(id: number): T | undefined {
    return id >= 0 && id < this.entries.length ? this.entries[id] : undefined;
  }
}
