import { Command } from 'commander';
import { resolve } from 'node:path';
import { loadConfig } from '../../config/index.js';
import { stdoutWriter, type OutputWriter } from '../../report/reporter.js';
import { cleanupStaleWorkDirs } from '../../utils/temp.js';

export interface CleanCommandOptions {
  maxAge: string;
}

/**
 * Remove work directories older than `maxAgeMinutes` and report how many went.
 */
export async function executeClean(
  maxAgeMinutes: number,
  write: OutputWriter = stdoutWriter
): Promise<number> {
  const workRoot = resolve(loadConfig().workRoot);
  const removed = await cleanupStaleWorkDirs(workRoot, maxAgeMinutes * 60 * 1000);
  write(JSON.stringify({ removed, workRoot }));
  return removed;
}

/**
 * Create the clean command.
 */
export function createCleanCommand(): Command {
  const command = new Command('clean')
    .description('Remove work directories left behind by interrupted runs')
    .option('--max-age <minutes>', 'Only remove directories older than this many minutes', '60')
    .action(async (options: CleanCommandOptions) => {
      const maxAge = Number(options.maxAge);
      if (!Number.isInteger(maxAge) || maxAge < 0) {
        throw new Error(`Invalid --max-age: ${options.maxAge}`);
      }
      await executeClean(maxAge);
    });

  return command;
}
