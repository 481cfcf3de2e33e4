import { Command } from 'commander';
import { stat } from 'node:fs/promises';
import { engineTimeoutSchema, loadConfig } from '../../config/index.js';
import { loadToolchain } from '../../config/toolchain.js';
import { PipelineOrchestrator, type OrchestratorOptions, type RunOptions } from '../../pipeline/orchestrator.js';
import { ResultReporter, stderrWriter, stdoutWriter, type OutputWriter } from '../../report/reporter.js';
import type { StageExecutor } from '../../sandbox/types.js';
import type { RunRequest } from '../../types/pipeline.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('cli:run');

export const RUN_USAGE = 'Usage: p4verdict run <p4_file> [forwarding_rules.txt] [timeout_seconds]';

const NUMERIC = /^\d+$/;

export interface ParsedRunArguments {
  sourceFile: string;
  rulesFile?: string;
  timeoutSeconds?: number;
  /** Positional arguments that are neither rules file nor timeout */
  ignored: string[];
}

/**
 * Interpret `<source> [rules] [timeout]`.
 *
 * The argument after the source is the rules file unless it is purely
 * numeric; the last argument after the source is the timeout only if it
 * is purely numeric. Returns null when no source was given.
 */
export function parseRunArguments(inputs: readonly string[]): ParsedRunArguments | null {
  const [sourceFile, ...rest] = inputs;
  if (sourceFile === undefined || sourceFile === '') {
    return null;
  }

  const parsed: ParsedRunArguments = { sourceFile, ignored: [] };
  const lastIndex = rest.length - 1;

  rest.forEach((value, index) => {
    if (index === 0 && !NUMERIC.test(value)) {
      parsed.rulesFile = value;
    } else if (index === lastIndex && NUMERIC.test(value)) {
      parsed.timeoutSeconds = Number(value);
    } else {
      parsed.ignored.push(value);
    }
  });

  return parsed;
}

export interface RunCommandOptions {
  /** Toolchain YAML file */
  config?: string;
}

/**
 * Injection points for tests; the CLI uses the defaults.
 */
export interface RunCommandDeps {
  executor?: StageExecutor;
  stdout?: OutputWriter;
  stderr?: OutputWriter;
  signal?: AbortSignal;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Execute `run` and return the process exit code.
 */
export async function executeRun(
  inputs: readonly string[],
  options: RunCommandOptions = {},
  deps: RunCommandDeps = {}
): Promise<number> {
  const parsed = parseRunArguments(inputs);
  if (!parsed) {
    new ResultReporter(deps.stderr ?? stderrWriter).emitCliError(RUN_USAGE);
    return 1;
  }

  if (parsed.ignored.length > 0) {
    log.warn({ ignored: parsed.ignored }, 'Ignoring extra arguments');
  }

  const reporter = new ResultReporter(deps.stdout ?? stdoutWriter);

  if (parsed.timeoutSeconds !== undefined) {
    const timeout = engineTimeoutSchema.safeParse(parsed.timeoutSeconds);
    if (!timeout.success) {
      const reason = timeout.error.issues.map((issue) => issue.message).join('; ');
      reporter.emitCliError(`Invalid timeout_seconds ${parsed.timeoutSeconds}: ${reason}`);
      return 1;
    }
  }

  if (!(await isFile(parsed.sourceFile))) {
    reporter.emitCliError(`P4 file not found: ${parsed.sourceFile}`);
    return 1;
  }

  let orchestratorOptions: OrchestratorOptions;
  try {
    const config = loadConfig();
    const toolchain = await loadToolchain(options.config ?? config.toolchainFile);
    orchestratorOptions = { config, toolchain, reporter };
  } catch (error) {
    reporter.emitCliError(error instanceof Error ? error.message : String(error));
    return 1;
  }

  if (deps.executor) {
    orchestratorOptions.executor = deps.executor;
  }

  const request: RunRequest = {
    sourceFile: parsed.sourceFile,
    rulesFile: parsed.rulesFile,
    engineTimeoutSeconds: parsed.timeoutSeconds ?? orchestratorOptions.config.timeouts.engineSeconds,
  };

  const runOptions: RunOptions = {};
  if (deps.signal) {
    runOptions.signal = deps.signal;
  }

  const outcome = await new PipelineOrchestrator(orchestratorOptions).run(request, runOptions);
  return outcome.exitCode;
}

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Verify the assertions of a P4 program and print a JSON verdict')
    .argument('[inputs...]', 'P4 source file, optional forwarding rules file, optional timeout in seconds')
    .option('-c, --config <file>', 'Toolchain YAML file overriding tool commands')
    .action(async (inputs: string[], options: RunCommandOptions) => {
      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals): void => {
        log.warn({ signal }, 'Received signal, aborting run');
        controller.abort();
      };

      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);
      try {
        process.exitCode = await executeRun(inputs, options, { signal: controller.signal });
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });

  return command;
}
