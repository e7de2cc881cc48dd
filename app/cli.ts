import { Command } from 'commander';
import { inspectCommand } from './commands/inspect.js';
import { dumpCommand } from './commands/dump.js';

const program = new Command();

program
  .name('chunkwire')
  .description('Inspect chunked protocol session recordings')
  .version('0.1.0');

// Register commands
program.addCommand(inspectCommand);
program.addCommand(dumpCommand);

export { program };
