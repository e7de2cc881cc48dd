/**
 * Synchronous byte stream handles.
 *
 * A handle is owned by exactly one writer, reader or recorder and is passed
 * in explicitly; nothing in the engine reaches for process.stdin/stdout.
 */

export interface ByteReader {
  /** Read up to `size` bytes, or everything left when omitted. Empty at EOF. */
  read(size?: number): Buffer;
  /** Read through the next \n inclusive, or the remainder. Empty at EOF. */
  readline(): Buffer;
}

export interface ByteWriter {
  write(data: Uint8Array | string): void;
  flush?(): void;
}

export function toBytes(data: Uint8Array | string): Buffer {
  if (typeof data === 'string') return Buffer.from(data, 'utf8');
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}
