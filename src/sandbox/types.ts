/**
 * Stage Execution Types
 *
 * Defines the contract between the pipeline and whatever actually runs
 * an external tool, so the orchestrator can be driven by a fake in tests.
 */

/**
 * Outcome of one external process.
 */
export const StageStatus = {
  SUCCESS: 'success',
  FAILED: 'failed',
  TIMED_OUT: 'timed_out',
  ABORTED: 'aborted',
} as const;

export type StageStatus = (typeof StageStatus)[keyof typeof StageStatus];

/**
 * One process invocation.
 */
export interface StageCommand {
  /** Executable to run (resolved through PATH) */
  command: string;
  /** Arguments passed verbatim, no shell involved */
  args: string[];
  /** Working directory (default: current directory) */
  cwd?: string;
  /** Wall-clock budget in seconds */
  timeoutSeconds: number;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Input to provide to stdin */
  stdin?: string;
  /** Aborts the process from outside (signal handling in the CLI) */
  signal?: AbortSignal;
}

/**
 * Result of running a StageCommand.
 */
export interface StageResult {
  status: StageStatus;
  /** Process exit code, null when killed by a signal */
  exitCode: number | null;
  /** Signal that terminated the process, if any */
  exitSignal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  /** stdout followed by stderr */
  output: string;
  /** Execution duration in milliseconds */
  durationMs: number;
}

/**
 * Anything able to run a StageCommand.
 */
export interface StageExecutor {
  /**
   * Run the command to completion, timeout or abort.
   * Rejects only when the process could not be started at all.
   */
  execute(command: StageCommand): Promise<StageResult>;
}
