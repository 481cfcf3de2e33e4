/**
 * Error types for pipeline failures before the engine verdict.
 * Each one ends the run with verdict `error` and exit code 1.
 */

import type { StageId } from './stages.js';

/**
 * Base class: carries the failing stage and the text used as report details.
 */
export class PipelineError extends Error {
  readonly stage: StageId;
  readonly details: string;

  constructor(stage: StageId, details: string) {
    super(details);
    this.stage = stage;
    this.details = details;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

/**
 * A build stage exited non-zero or did not produce its artifact.
 */
export class CompilationFailureError extends PipelineError {
  readonly name = 'CompilationFailureError';
  readonly missingArtifact: string | null;

  constructor(stage: StageId, label: string, output: string, missingArtifact: string | null = null) {
    const suffix = missingArtifact ? `\nMissing artifact: ${missingArtifact}` : '';
    super(stage, `${label} failed:\n${output}${suffix}`);
    this.missingArtifact = missingArtifact;
    Object.setPrototypeOf(this, CompilationFailureError.prototype);
  }
}

/**
 * A build stage exceeded its time budget.
 */
export class InfrastructureTimeoutError extends PipelineError {
  readonly name = 'InfrastructureTimeoutError';
  readonly timeoutSeconds: number;

  constructor(stage: StageId, label: string, timeoutSeconds: number, partialOutput: string) {
    const suffix = partialOutput ? `:\n${partialOutput}` : '';
    super(stage, `${label} timeout after ${timeoutSeconds}s${suffix}`);
    this.timeoutSeconds = timeoutSeconds;
    Object.setPrototypeOf(this, InfrastructureTimeoutError.prototype);
  }
}

/**
 * A build stage could not be run at all (spawn failure, I/O error).
 */
export class StageExecutionError extends PipelineError {
  readonly name = 'StageExecutionError';

  constructor(stage: StageId, label: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(stage, `${label} error: ${message}`);
    Object.setPrototypeOf(this, StageExecutionError.prototype);
  }
}

/**
 * The run was interrupted by a signal while a stage was running.
 */
export class RunAbortedError extends PipelineError {
  readonly name = 'RunAbortedError';

  constructor(stage: StageId, label: string) {
    super(stage, `${label} aborted: run interrupted`);
    Object.setPrototypeOf(this, RunAbortedError.prototype);
  }
}
