// src/core/archive/source.ts
// Pull-based byte source over one record, and an exact-read cursor on top.

import { MalformedArchiveError } from "../errors";

/**
 * Copies up to `buffer.length` bytes into `buffer` and returns how many
 * were copied; 0 once the record is exhausted.
 */
export type PullReader = (buffer: Uint8Array) => number;

export function createRecordSource(bytes: Uint8Array): PullReader {
  let bytesRead = 0;
  return (buffer: Uint8Array): number => {
    if (bytesRead >= bytes.length) return 0;
    const len = Math.min(bytes.length - bytesRead, buffer.length);
    buffer.set(bytes.subarray(bytesRead, bytesRead + len));
    bytesRead += len;
    return len;
  };
}

const READ_CHUNK = 64 * 1024;

const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

/**
 * Exact reads over a pull reader, tracking the offset for diagnostics.
 */
export class ByteCursor {
  private pos = 0;

  constructor(private readonly pull: PullReader, private readonly archive: string) {}

  get offset(): number {
    return this.pos;
  }

  /** Next byte, or undefined at end of stream */
  tryU8(): number | undefined {
    const one = new Uint8Array(1);
    if (this.pull(one) === 0) return undefined;
    this.pos += 1;
    return one[0];
  }

  /** Exactly n bytes; the buffer grows as data arrives */
  bytes(n: number): Uint8Array {
    let out = new Uint8Array(Math.min(n, READ_CHUNK));
    let filled = 0;
    while (filled < n) {
      if (filled === out.length) {
        const grown = new Uint8Array(Math.min(n, out.length * 2));
        grown.set(out);
        out = grown;
      }
      const got = this.pull(out.subarray(filled));
      if (got === 0) {
        throw new MalformedArchiveError(`unexpected end of stream: wanted ${n} bytes, got ${filled}`, {
          archive: this.archive,
          offset: this.pos + filled,
        });
      }
      filled += got;
    }
    this.pos += n;
    return out;
  }

  u8(): number {
    return this.bytes(1)[0];
  }

  u16le(): number {
    return view(this.bytes(2)).getUint16(0, true);
  }

  u32le(): number {
    return view(this.bytes(4)).getUint32(0, true);
  }

  i32le(): number {
    return view(this.bytes(4)).getInt32(0, true);
  }

  f64be(): number {
    return view(this.bytes(8)).getFloat64(0, false);
  }

  /** Little-endian two's complement integer of n bytes */
  signedLE(n: number): bigint {
    const b = this.bytes(n);
    let result = 0n;
    for (let i = n - 1; i >= 0; i--) {
      result = (result << 8n) | BigInt(b[i]);
    }
    if (n > 0 && b[n - 1] & 0x80) {
      result -= 1n << BigInt(8 * n);
    }
    return result;
  }

  utf8(n: number): string {
    const start = this.pos;
    const b = this.bytes(n);
    try {
      return utf8.decode(b);
    } catch {
      throw new MalformedArchiveError("string is not valid UTF-8", { archive: this.archive, offset: start });
    }
  }

  /** Newline-terminated ASCII line, without the newline */
  line(): string {
    const chars: number[] = [];
    for (;;) {
      const c = this.u8();
      if (c === 0x0a) break;
      chars.push(c);
    }
    return latin1.decode(new Uint8Array(chars));
  }
}

function view(b: Uint8Array): DataView {
  return new DataView(b.buffer, b.byteOffset, b.byteLength);
}
