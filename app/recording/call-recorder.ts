/**
 * Call recorder for deterministic regression runs.
 *
 * In live mode each recorded call runs for real and its result is appended to
 * a per-call-site queue; `stop()` persists the queues together with whatever
 * the code under test wrote to `output`. In replay mode the same calls pop
 * their results from the saved queues instead, and `stop()` checks that the
 * output came out byte-for-byte identical.
 *
 * Calls are grouped into parts (`nextPart()`), one per logical phase of a run.
 *
 * File format: gzip of the metadata codec encoding of
 *   { "version": 1, "parts": [{ "<site>": [result, ...] }, ...], "output": "<base64>" }
 */

import { readFileSync, writeFileSync } from 'fs';
import { gunzipSync, gzipSync } from 'zlib';
import { z } from 'zod';
import {
  ContractViolationError,
  NotConfiguredError,
  RecordingIntegrityError,
  ReplayExhaustedError,
} from '../errors.js';
import { decodeMetadata, encodeMetadata, type MetadataValue } from '../codec/metadata.js';
import { MemoryStream } from '../streams/memory-stream.js';

export type RecorderModeName = 'uninitialized' | 'live' | 'replay';

type CallQueues = Map<string, MetadataValue[]>;

export interface RecorderMode {
  readonly name: RecorderModeName;
  readonly output: MemoryStream;
  call<T extends MetadataValue>(site: string, fn: () => T, schema: z.ZodType<T>): T;
  nextPart(): void;
  stop(): void;
}

export const metadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.nan(),
    z.string(),
    z.array(metadataValueSchema),
    z.record(z.string(), metadataValueSchema),
  ])
);

const callRecordingSchema = z.object({
  version: z.literal(1),
  parts: z.array(z.record(z.string(), z.array(metadataValueSchema))),
  output: z.string(),
});

type CallRecordingDocument = z.infer<typeof callRecordingSchema>;

function loadCallRecording(path: string): CallRecordingDocument {
  const text = gunzipSync(readFileSync(path)).toString('utf8');
  const result = callRecordingSchema.safeParse(decodeMetadata(text));
  if (!result.success) {
    throw new RecordingIntegrityError(`${path} is not a call recording: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

export class UninitializedMode implements RecorderMode {
  readonly name = 'uninitialized';

  get output(): MemoryStream {
    throw new NotConfiguredError('output');
  }

  call<T extends MetadataValue>(site: string): T {
    throw new NotConfiguredError(`call ${site}`);
  }

  nextPart(): void {
    throw new NotConfiguredError('nextPart');
  }

  stop(): void {
    throw new NotConfiguredError('stop');
  }
}

export class LiveMode implements RecorderMode {
  readonly name = 'live';
  readonly output = new MemoryStream();
  private readonly parts: CallQueues[] = [new Map()];
  private stopped = false;

  constructor(private readonly path: string) {}

  call<T extends MetadataValue>(site: string, fn: () => T, schema: z.ZodType<T>): T {
    this.ensureRunning();
    const result = fn();
    schema.parse(result);

    const part = this.parts[this.parts.length - 1];
    const queue = part.get(site);
    if (queue) {
      queue.push(result);
    } else {
      part.set(site, [result]);
    }
    return result;
  }

  nextPart(): void {
    this.ensureRunning();
    this.parts.push(new Map());
  }

  stop(): void {
    this.ensureRunning();
    this.stopped = true;

    const document = new Map<string, MetadataValue | CallQueues[]>([
      ['version', 1],
      ['parts', this.parts],
      ['output', this.output.getValue().toString('base64')],
    ]);
    writeFileSync(this.path, gzipSync(encodeMetadata(document)));
  }

  private ensureRunning(): void {
    if (this.stopped) {
      throw new ContractViolationError(`Recording ${this.path} has already been stopped`);
    }
  }
}

export class ReplayMode implements RecorderMode {
  readonly name = 'replay';
  readonly output = new MemoryStream();
  private readonly parts: CallQueues[];
  private readonly expectedOutput: Buffer;
  private current: CallQueues;
  private stopped = false;

  constructor(private readonly path: string) {
    const document = loadCallRecording(path);
    this.parts = document.parts.map((part) => new Map(Object.entries(part)));
    this.expectedOutput = Buffer.from(document.output, 'base64');
    this.current = this.takePart();
  }

  call<T extends MetadataValue>(site: string, _fn: () => T, schema: z.ZodType<T>): T {
    this.ensureRunning();
    const queue = this.current.get(site);
    const recorded = queue?.shift();
    if (recorded === undefined) {
      throw new ReplayExhaustedError(site);
    }

    const result = schema.safeParse(recorded);
    if (!result.success) {
      throw new RecordingIntegrityError(`Recorded result for "${site}" no longer matches its schema`);
    }
    return result.data;
  }

  nextPart(): void {
    this.ensureRunning();
    this.current = this.takePart();
  }

  stop(): void {
    this.ensureRunning();
    this.stopped = true;

    const actual = this.output.getValue();
    if (!actual.equals(this.expectedOutput)) {
      throw new RecordingIntegrityError(
        `Replayed output differs from ${this.path} (expected ${this.expectedOutput.length} bytes, got ${actual.length})`
      );
    }
  }

  private ensureRunning(): void {
    if (this.stopped) {
      throw new ContractViolationError(`Replay of ${this.path} has already been stopped`);
    }
  }

  private takePart(): CallQueues {
    const part = this.parts.shift();
    if (part === undefined) {
      throw new RecordingIntegrityError(`${this.path} has no more recorded parts`);
    }
    return part;
  }
}

// ---------------------------------------------------------------------------
// Recorder
// ---------------------------------------------------------------------------

export class CallRecorder {
  private mode: RecorderMode = new UninitializedMode();

  static live(path: string): CallRecorder {
    const recorder = new CallRecorder();
    recorder.record(path);
    return recorder;
  }

  static replay(path: string): CallRecorder {
    const recorder = new CallRecorder();
    recorder.playback(path);
    return recorder;
  }

  get modeName(): RecorderModeName {
    return this.mode.name;
  }

  get output(): MemoryStream {
    return this.mode.output;
  }

  record(path: string): void {
    this.select(new LiveMode(path));
  }

  playback(path: string): void {
    this.select(new ReplayMode(path));
  }

  call<T extends MetadataValue>(site: string, fn: () => T, schema: z.ZodType<T>): T {
    return this.mode.call(site, fn, schema);
  }

  nextPart(): void {
    this.mode.nextPart();
  }

  stop(): void {
    this.mode.stop();
  }

  private select(mode: RecorderMode): void {
    if (this.mode.name !== 'uninitialized') {
      throw new ContractViolationError(`Call recorder is already in ${this.mode.name} mode`);
    }
    this.mode = mode;
  }
}
