import { Command } from 'commander';
import { resolve } from 'path';
import { homedir } from 'os';
import { ChunkReader, inspectorMessages, parseBody } from '../protocol/chunk-reader.js';
import { MemoryStream } from '../streams/memory-stream.js';
import { readRecording } from '../streams/tee-recorder.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger({ prefix: '[inspect]' });

export interface DescribeOptions {
  /** Append each chunk's decoded metadata. */
  metadata?: boolean;
}

/**
 * One summary line per chunk in a captured protocol stream.
 */
export function describeChunks(bytes: Buffer, options: DescribeOptions = {}): string[] {
  const reader = new ChunkReader(new MemoryStream(bytes));
  const lines: string[] = [];

  for (let chunk = reader.readChunk(); chunk !== null; chunk = reader.readChunk()) {
    const { records } = parseBody(chunk.body);
    const messages = inspectorMessages(chunk.metadata);

    lines.push(
      `#${reader.chunkCount} metadata=${chunk.rawMetadata.length} body=${chunk.body.length} ` +
        `records=${records.length} messages=${messages.length} ` +
        `finished=${chunk.metadata.finished === true} partial=${chunk.metadata.partial === true}`
    );

    if (options.metadata) {
      lines.push(`  ${chunk.rawMetadata.toString('utf8')}`);
    }
  }

  return lines;
}

export const inspectCommand = new Command('inspect')
  .description('Summarize the chunks in a session recording')
  .argument('<recording>', 'Path to a .input.gz or .output.gz recording')
  .option('-m, --metadata', 'Print the metadata of every chunk')
  .action((recording: string, options: DescribeOptions) => {
    const path = resolve(recording.replace(/^~/, homedir()));

    try {
      const lines = describeChunks(readRecording(path), options);
      if (lines.length === 0) {
        console.log('No chunks recorded.');
        return;
      }
      for (const line of lines) {
        console.log(line);
      }
    } catch (err) {
      logger.error(`Failed to inspect ${path}:`, err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });
