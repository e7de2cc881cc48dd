/**
 * Tee recorders: pass-through wrappers that copy every byte a caller reads
 * or writes into an in-memory mirror and a gzip file. The file is truncated
 * when the recorder opens it and only appended to afterwards.
 *
 * Each call's bytes become one gzip member appended to the file, in call
 * order, so a recording that was cut short still decompresses up to the
 * last completed call. Decompressing the whole file yields the mirror.
 *
 * Usage:
 *     const input = new TeeReader('/tmp/session.input.gz', new FdReader(0));
 *     try {
 *       const reader = new ChunkReader(input);
 *       ...
 *     } finally {
 *       input.close();
 *     }
 */

import { closeSync, fsyncSync, openSync, readFileSync, writeSync } from 'fs';
import { gunzipSync, gzipSync } from 'zlib';
import { ContractViolationError, RecordingIntegrityError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { MemoryStream } from './memory-stream.js';
import { toBytes, type ByteReader, type ByteWriter } from './types.js';

export abstract class TeeRecorder {
  readonly recordingPath: string;
  protected readonly log: Logger;
  private readonly mirror = new MemoryStream();
  private fd: number | null;

  constructor(recordingPath: string, logger?: Logger) {
    this.recordingPath = recordingPath;
    this.log = logger ?? rootLogger.child('[tee]');
    this.fd = openSync(recordingPath, 'w');
    this.log.debug(`Recording to ${recordingPath}`);
  }

  get closed(): boolean {
    return this.fd === null;
  }

  /** Every byte observed so far, in call order. */
  getValue(): Buffer {
    return this.mirror.getValue();
  }

  /**
   * Flush the recording to disk and release it. Safe to call more than once.
   */
  close(): void {
    const fd = this.fd;
    if (fd === null) return;

    this.fd = null;
    try {
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    this.log.debug(`Closed ${this.recordingPath} (${this.mirror.size} bytes recorded)`);
  }

  protected ensureOpen(): number {
    if (this.fd === null) {
      throw new ContractViolationError(`Recording ${this.recordingPath} is closed`);
    }
    return this.fd;
  }

  protected capture(bytes: Buffer): void {
    const fd = this.ensureOpen();
    if (bytes.length === 0) return;

    this.mirror.write(bytes);

    const member = gzipSync(bytes);
    let offset = 0;
    while (offset < member.length) {
      offset += writeSync(fd, member, offset, member.length - offset);
    }
  }
}

export class TeeReader extends TeeRecorder implements ByteReader {
  constructor(
    recordingPath: string,
    private readonly source: ByteReader,
    logger?: Logger
  ) {
    super(recordingPath, logger);
  }

  read(size?: number): Buffer {
    this.ensureOpen();
    const bytes = this.source.read(size);
    this.capture(bytes);
    return bytes;
  }

  readline(): Buffer {
    this.ensureOpen();
    const bytes = this.source.readline();
    this.capture(bytes);
    return bytes;
  }
}

export class TeeWriter extends TeeRecorder implements ByteWriter {
  constructor(
    recordingPath: string,
    private readonly sink: ByteWriter,
    logger?: Logger
  ) {
    super(recordingPath, logger);
  }

  write(data: Uint8Array | string): void {
    this.ensureOpen();
    this.sink.write(data);
    this.capture(toBytes(data));
  }

  flush(): void {
    this.ensureOpen();
    this.sink.flush?.();
  }
}

// ---------------------------------------------------------------------------
// Scoped use and verification
// ---------------------------------------------------------------------------

export function withTeeReader<T>(recordingPath: string, source: ByteReader, fn: (tee: TeeReader) => T): T {
  const tee = new TeeReader(recordingPath, source);
  try {
    return fn(tee);
  } finally {
    tee.close();
  }
}

export function withTeeWriter<T>(recordingPath: string, sink: ByteWriter, fn: (tee: TeeWriter) => T): T {
  const tee = new TeeWriter(recordingPath, sink);
  try {
    return fn(tee);
  } finally {
    tee.close();
  }
}

/**
 * Decompress a recording file into the bytes it captured.
 */
export function readRecording(recordingPath: string): Buffer {
  const compressed = readFileSync(recordingPath);
  return compressed.length === 0 ? Buffer.alloc(0) : gunzipSync(compressed);
}

function firstDifference(a: Buffer, b: Buffer): number {
  const limit = Math.min(a.length, b.length);
  for (let i = 0; i < limit; i++) {
    if (a[i] !== b[i]) return i;
  }
  return limit;
}

/**
 * Check that the recording file decompresses to exactly the mirrored bytes.
 */
export function assertRecordingIntact(tee: TeeRecorder): void {
  const recorded = readRecording(tee.recordingPath);
  const mirrored = tee.getValue();

  if (!recorded.equals(mirrored)) {
    throw new RecordingIntegrityError(
      `${tee.recordingPath} differs from the mirrored stream at byte ${firstDifference(recorded, mirrored)} ` +
        `(recorded ${recorded.length} bytes, mirrored ${mirrored.length})`
    );
  }
}
