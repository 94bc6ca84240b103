import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createVolumesCommand } from './commands/volumes.js';
import { VERSION } from '../server/types.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('craftfleet')
    .description('craftfleet - Provision and tear down game servers on Kubernetes')
    .version(VERSION, '-v, --version', 'Output the current version');

  // Add commands
  program.addCommand(createServeCommand());
  program.addCommand(createVolumesCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createServeCommand } from './commands/serve.js';
export { createVolumesCommand } from './commands/volumes.js';
