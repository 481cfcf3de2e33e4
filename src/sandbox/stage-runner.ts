/**
 * Stage Runner
 *
 * Runs one external tool as a child process in its own process group.
 * stdout and stderr are drained by independent listeners while the
 * process runs; a tool that fills both pipes cannot stall on a reader
 * that is blocked on the other stream.
 */

import { spawn } from 'node:child_process';
import { createLogger } from '../utils/logger.js';
import {
  StageStatus,
  type StageCommand,
  type StageExecutor,
  type StageResult,
} from './types.js';

const log = createLogger('stage-runner');

/**
 * Error thrown when a process cannot be spawned (missing binary, bad cwd).
 */
export class StageSpawnError extends Error {
  readonly name = 'StageSpawnError';
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: Error) {
    super(`Failed to start ${command}: ${cause.message}`);
    this.command = command;
    this.code = (cause as NodeJS.ErrnoException).code;
    Object.setPrototypeOf(this, StageSpawnError.prototype);
  }
}

/**
 * Largest delay setTimeout honours; longer ones fire after 1ms.
 */
export const MAX_STAGE_TIMEOUT_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

// Process groups only exist on POSIX
const useProcessGroup = process.platform !== 'win32';

/**
 * Stage executor backed by child_process.spawn.
 */
export class ProcessStageRunner implements StageExecutor {
  execute(cmd: StageCommand): Promise<StageResult> {
    const startTime = Date.now();

    if (!(cmd.timeoutSeconds > 0 && cmd.timeoutSeconds <= MAX_STAGE_TIMEOUT_SECONDS)) {
      return Promise.reject(
        new RangeError(
          `Timeout for ${cmd.command} must be above 0 and at most ${MAX_STAGE_TIMEOUT_SECONDS}s, got ${cmd.timeoutSeconds}`
        )
      );
    }

    if (cmd.signal?.aborted) {
      return Promise.resolve({
        status: StageStatus.ABORTED,
        exitCode: null,
        exitSignal: null,
        stdout: '',
        stderr: '',
        output: '',
        durationMs: 0,
      });
    }

    const env = {
      ...process.env,
      ...cmd.env,
    };

    log.debug(
      { command: cmd.command, args: cmd.args, cwd: cmd.cwd, timeoutSeconds: cmd.timeoutSeconds },
      'Starting stage process'
    );

    return new Promise((resolve, reject) => {
      const proc = spawn(cmd.command, cmd.args, {
        cwd: cmd.cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: useProcessGroup,
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let aborted = false;
      let settled = false;

      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      // The tool may exit before reading its stdin
      proc.stdin.on('error', (err) => {
        log.debug({ command: cmd.command, err }, 'stdin closed early');
      });

      if (cmd.stdin !== undefined) {
        proc.stdin.write(cmd.stdin);
      }
      proc.stdin.end();

      const killTree = (): void => {
        const pid = proc.pid;
        if (pid === undefined) {
          return;
        }
        if (useProcessGroup) {
          try {
            // Negative pid targets the whole group, descendants included
            process.kill(-pid, 'SIGKILL');
            return;
          } catch (err) {
            log.debug({ pid, err }, 'Process group already gone, killing child directly');
          }
        }
        proc.kill('SIGKILL');
      };

      const timeoutId = setTimeout(() => {
        timedOut = true;
        log.warn(
          { command: cmd.command, timeoutSeconds: cmd.timeoutSeconds },
          'Stage process timed out, killing process group'
        );
        killTree();
      }, cmd.timeoutSeconds * 1000);

      const onAbort = (): void => {
        aborted = true;
        log.warn({ command: cmd.command }, 'Stage process aborted, killing process group');
        killTree();
      };
      cmd.signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        clearTimeout(timeoutId);
        cmd.signal?.removeEventListener('abort', onAbort);
      };

      proc.on('close', (code, signal) => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();

        const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
        const stderr = Buffer.concat(stderrChunks).toString('utf-8');

        let status: StageStatus;
        if (aborted) {
          status = StageStatus.ABORTED;
        } else if (timedOut) {
          status = StageStatus.TIMED_OUT;
        } else if (code === 0) {
          status = StageStatus.SUCCESS;
        } else {
          status = StageStatus.FAILED;
        }

        const result: StageResult = {
          status,
          exitCode: code,
          exitSignal: signal,
          stdout,
          stderr,
          output: stdout + stderr,
          durationMs: Date.now() - startTime,
        };

        log.debug(
          { command: cmd.command, status, exitCode: code, durationMs: result.durationMs },
          'Stage process finished'
        );
        resolve(result);
      });

      proc.on('error', (err) => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        reject(new StageSpawnError(cmd.command, err));
      });
    });
  }
}
