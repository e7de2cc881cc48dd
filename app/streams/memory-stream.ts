import { toBytes, type ByteReader, type ByteWriter } from './types.js';

const INITIAL_CAPACITY = 4096;
const NEWLINE = 0x0a;

/**
 * In-memory byte stream. Reads advance a cursor from the start; writes
 * always append at the end.
 */
export class MemoryStream implements ByteReader, ByteWriter {
  private data: Buffer;
  private length = 0;
  private position = 0;

  constructor(initial?: Uint8Array | string) {
    const bytes = initial === undefined ? Buffer.alloc(0) : toBytes(initial);
    this.data = Buffer.alloc(Math.max(INITIAL_CAPACITY, bytes.length));
    bytes.copy(this.data);
    this.length = bytes.length;
  }

  read(size?: number): Buffer {
    const end = size === undefined || size < 0 ? this.length : Math.min(this.length, this.position + size);
    return this.take(end);
  }

  readline(): Buffer {
    const newline = this.data.indexOf(NEWLINE, this.position);
    const end = newline === -1 || newline >= this.length ? this.length : newline + 1;
    return this.take(end);
  }

  write(data: Uint8Array | string): void {
    const bytes = toBytes(data);
    this.reserve(this.length + bytes.length);
    bytes.copy(this.data, this.length);
    this.length += bytes.length;
  }

  /** Copy of everything written or supplied, regardless of the read cursor. */
  getValue(): Buffer {
    return Buffer.from(this.data.subarray(0, this.length));
  }

  tell(): number {
    return this.position;
  }

  seek(position: number): void {
    this.position = Math.max(0, Math.min(position, this.length));
  }

  get size(): number {
    return this.length;
  }

  private take(end: number): Buffer {
    const start = this.position;
    this.position = end;
    return Buffer.from(this.data.subarray(start, end));
  }

  private reserve(capacity: number): void {
    if (capacity <= this.data.length) return;

    let next = this.data.length * 2;
    while (next < capacity) next *= 2;

    const grown = Buffer.alloc(next);
    this.data.copy(grown, 0, 0, this.length);
    this.data = grown;
  }
}
