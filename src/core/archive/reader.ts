// src/core/archive/reader.ts
// Named-record access over the ZIP container.

import { unzipSync } from "fflate";
import { MalformedArchiveError, RecordNotFoundError } from "../errors";

export type RecordData = { bytes: Uint8Array; size: number };

/**
 * Read-only view of a container's named records.
 */
export interface ArchiveReader {
  /** Whole record; throws RecordNotFoundError when absent */
  getRecord(name: string): RecordData;
  hasRecord(name: string): boolean;
  /** Record names, with any container prefix removed */
  listRecords(): string[];
}

/**
 * Records held in memory, keyed by name.
 */
export class MemoryArchiveReader implements ArchiveReader {
  private readonly records: Map<string, Uint8Array>;

  constructor(records: Map<string, Uint8Array> | Record<string, Uint8Array>) {
    this.records = records instanceof Map ? new Map(records) : new Map(Object.entries(records));
  }

  getRecord(name: string): RecordData {
    const bytes = this.records.get(name);
    if (!bytes) throw new RecordNotFoundError(name);
    return { bytes, size: bytes.byteLength };
  }

  hasRecord(name: string): boolean {
    return this.records.has(name);
  }

  listRecords(): string[] {
    return Array.from(this.records.keys());
  }
}

/**
 * ZIP container reader. Entry names are indexed on open without inflating
 * anything; a record is inflated on first request and kept afterwards.
 *
 * Writers place every record under one top-level directory named after the
 * saved module. When all entries share such a directory it is treated as a
 * prefix and hidden from record names.
 */
export class ZipArchiveReader implements ArchiveReader {
  private readonly entries = new Map<string, string>();
  private readonly cache = new Map<string, Uint8Array>();
  readonly prefix: string;

  constructor(private readonly data: Uint8Array) {
    const names: string[] = [];
    try {
      unzipSync(data, {
        filter: file => {
          if (!file.name.endsWith("/")) names.push(file.name);
          return false;
        },
      });
    } catch (err) {
      throw new MalformedArchiveError(`not a readable ZIP container (${errorMessage(err)})`);
    }

    this.prefix = commonPrefix(names);
    for (const full of names) {
      this.entries.set(full.slice(this.prefix.length), full);
    }
  }

  getRecord(name: string): RecordData {
    const cached = this.cache.get(name);
    if (cached) return { bytes: cached, size: cached.byteLength };

    const full = this.entries.get(name);
    if (full === undefined) throw new RecordNotFoundError(name);

    const out = unzipSync(this.data, { filter: file => file.name === full });
    const bytes = out[full];
    if (!bytes) throw new RecordNotFoundError(name);
    this.cache.set(name, bytes);
    return { bytes, size: bytes.byteLength };
  }

  hasRecord(name: string): boolean {
    return this.entries.has(name);
  }

  listRecords(): string[] {
    return Array.from(this.entries.keys());
  }
}

function commonPrefix(names: string[]): string {
  if (names.length === 0) return "";
  const first = names[0];
  const slash = first.indexOf("/");
  if (slash <= 0) return "";
  const prefix = first.slice(0, slash + 1);
  return names.every(n => n.startsWith(prefix)) ? prefix : "";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
