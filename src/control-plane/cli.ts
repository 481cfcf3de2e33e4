import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createCleanCommand } from './commands/clean.js';

/**
 * Kept in step with package.json
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('p4verdict')
    .description('Verify assertions in P4 programs through symbolic execution')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand());
  program.addCommand(createCleanCommand());

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
        error.code === 'commander.version' ||
        error.code === 'commander.help')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}

export { createRunCommand, executeRun, parseRunArguments, RUN_USAGE } from './commands/run.js';
export { createCleanCommand, executeClean } from './commands/clean.js';
