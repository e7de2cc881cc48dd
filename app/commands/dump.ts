import { Command } from 'commander';
import { resolve } from 'path';
import { homedir } from 'os';
import { FdWriter } from '../streams/fd-stream.js';
import { readRecording } from '../streams/tee-recorder.js';
import { Logger } from '../utils/logger.js';

const logger = new Logger({ prefix: '[dump]' });

export const dumpCommand = new Command('dump')
  .description('Write the decompressed bytes of a session recording to stdout')
  .argument('<recording>', 'Path to a .input.gz or .output.gz recording')
  .action((recording: string) => {
    const path = resolve(recording.replace(/^~/, homedir()));

    try {
      new FdWriter(1).write(readRecording(path));
    } catch (err) {
      logger.error(`Failed to dump ${path}:`, err instanceof Error ? err.message : err);
      process.exitCode = 1;
    }
  });
