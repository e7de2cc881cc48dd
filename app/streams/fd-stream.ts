/**
 * Blocking byte streams over file descriptors, for a command process
 * talking to its host over stdin (fd 0) and stdout (fd 1).
 *
 * Errors from readSync/writeSync (EAGAIN on a non-blocking pipe, EPIPE)
 * propagate to the caller.
 */

import { readSync, writeSync } from 'fs';
import { toBytes, type ByteReader, type ByteWriter } from './types.js';

const DEFAULT_BLOCK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

export class FdReader implements ByteReader {
  private pending: Buffer = Buffer.alloc(0);
  private eof = false;

  constructor(
    private readonly fd: number,
    private readonly blockSize = DEFAULT_BLOCK_SIZE
  ) {}

  read(size?: number): Buffer {
    if (size === undefined || size < 0) {
      while (this.fill());
      return this.take(this.pending.length);
    }
    while (this.pending.length < size && this.fill());
    return this.take(Math.min(size, this.pending.length));
  }

  readline(): Buffer {
    let searchFrom = 0;
    for (;;) {
      const newline = this.pending.indexOf(NEWLINE, searchFrom);
      if (newline !== -1) {
        return this.take(newline + 1);
      }
      searchFrom = this.pending.length;
      if (!this.fill()) {
        return this.take(this.pending.length);
      }
    }
  }

  private fill(): boolean {
    if (this.eof) return false;

    const block = Buffer.allocUnsafe(this.blockSize);
    const bytesRead = readSync(this.fd, block, 0, this.blockSize, null);
    if (bytesRead === 0) {
      this.eof = true;
      return false;
    }

    this.pending = Buffer.concat([this.pending, block.subarray(0, bytesRead)]);
    return true;
  }

  private take(count: number): Buffer {
    const taken = this.pending.subarray(0, count);
    this.pending = this.pending.subarray(count);
    return Buffer.from(taken);
  }
}

export class FdWriter implements ByteWriter {
  constructor(private readonly fd: number) {}

  write(data: Uint8Array | string): void {
    const bytes = toBytes(data);
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
    }
  }
}
