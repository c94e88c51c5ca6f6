// src/core/archive/adapters.ts
// Random-access byte sources a container can be opened from.

import * as fs from "fs";

/**
 * Generic random-access source of container bytes.
 */
export interface ReadAdapter {
  size(): number;
  /** Up to `length` bytes starting at `offset` */
  read(offset: number, length: number): Uint8Array;
}

export class BufferReadAdapter implements ReadAdapter {
  constructor(private readonly data: Uint8Array) {}

  size(): number {
    return this.data.byteLength;
  }

  read(offset: number, length: number): Uint8Array {
    return this.data.subarray(offset, Math.min(offset + length, this.data.byteLength));
  }
}

/**
 * Reads a file by descriptor. The descriptor stays open until close().
 */
export class FileReadAdapter implements ReadAdapter {
  private readonly fd: number;
  private readonly bytes: number;

  constructor(readonly filePath: string) {
    this.fd = fs.openSync(filePath, "r");
    this.bytes = fs.fstatSync(this.fd).size;
  }

  size(): number {
    return this.bytes;
  }

  read(offset: number, length: number): Uint8Array {
    const out = new Uint8Array(Math.max(0, Math.min(length, this.bytes - offset)));
    let filled = 0;
    while (filled < out.length) {
      const got = fs.readSync(this.fd, out, filled, out.length - filled, offset + filled);
      if (got === 0) break;
      filled += got;
    }
    return out.subarray(0, filled);
  }

  close(): void {
    fs.closeSync(this.fd);
  }
}

/**
 * Whole contents of an adapter as one buffer.
 */
export function readAll(adapter: ReadAdapter): Uint8Array {
  const size = adapter.size();
  const out = new Uint8Array(size);
  let filled = 0;
  while (filled < size) {
    const chunk = adapter.read(filled, size - filled);
    if (chunk.byteLength === 0) {
      throw new Error(`Read adapter ended at ${filled} of ${size} bytes`);
    }
    out.set(chunk, filled);
    filled += chunk.byteLength;
  }
  return out;
}

/**
 * Collect a byte stream (Node readable streams are async iterables).
 */
export async function collectStream(stream: AsyncIterable<Uint8Array | string>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? new TextEncoder().encode(chunk) : chunk;
    chunks.push(bytes);
    total += bytes.byteLength;
  }
  const out = new Uint8Array(total);
  let at = 0;
  for (const c of chunks) {
    out.set(c, at);
    at += c.byteLength;
  }
  return out;
}
