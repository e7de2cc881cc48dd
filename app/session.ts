/**
 * Command session wiring.
 *
 * Builds the reader/writer pair a command process uses to talk to its host,
 * optionally capturing both directions with tee recorders for later replay.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import type { ChunkwireConfig } from './config/index.js';
import { ChunkReader } from './protocol/chunk-reader.js';
import { RecordWriter } from './protocol/record-writer.js';
import { FdReader, FdWriter } from './streams/fd-stream.js';
import { TeeReader, TeeWriter, type TeeRecorder } from './streams/tee-recorder.js';
import type { ByteReader, ByteWriter } from './streams/types.js';
import { Logger } from './utils/logger.js';

export interface CommandStreams {
  input: ByteReader;
  output: ByteWriter;
}

export interface CommandSession {
  reader: ChunkReader;
  writer: RecordWriter;
  /** Active tee recorders; empty when recording is disabled. */
  recorders: TeeRecorder[];
  /** Close the recorders. The streams themselves belong to the caller. */
  close(): void;
}

export function recordingStamp(now: Date): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

export function openCommandSession(
  config: ChunkwireConfig,
  streams: CommandStreams = { input: new FdReader(0), output: new FdWriter(1) },
  now: Date = new Date()
): CommandSession {
  const log = new Logger({ level: config.logging.level, prefix: '[session]' });
  const recorders: TeeRecorder[] = [];
  let input = streams.input;
  let output = streams.output;

  if (config.recording.enabled) {
    mkdirSync(config.recording.dir, { recursive: true });
    const base = join(config.recording.dir, recordingStamp(now));

    const teeInput = new TeeReader(`${base}.input.gz`, input, log);
    recorders.push(teeInput);
    try {
      const teeOutput = new TeeWriter(`${base}.output.gz`, output, log);
      recorders.push(teeOutput);
      input = teeInput;
      output = teeOutput;
    } catch (err) {
      teeInput.close();
      throw err;
    }
    log.info(`Recording session to ${base}.{input,output}.gz`);
  }

  const writer = new RecordWriter(output, {
    maxResultRows: config.writer.maxResultRows,
    logger: log.child('[record-writer]'),
  });

  return {
    reader: new ChunkReader(input),
    writer,
    recorders,
    close(): void {
      let failure: unknown = null;
      for (const recorder of recorders) {
        try {
          recorder.close();
        } catch (err) {
          failure ??= err;
        }
      }
      if (failure !== null) throw failure;
    },
  };
}
