import type { Verdict, VerdictReport } from './verdict.js';

// Run Phase (State Machine States)
export const RunPhase = {
  INIT: 'init',
  FRONTEND: 'frontend',
  TRANSLATE: 'translate',
  NATIVE: 'native',
  ENGINE: 'engine',
  CLASSIFY: 'classify',
  REPORT: 'report',
  DONE: 'done',
} as const;

export type RunPhase = (typeof RunPhase)[keyof typeof RunPhase];

// Run Events
export const RunEvent = {
  STARTED: 'started',
  STAGE_SUCCEEDED: 'stage_succeeded',
  STAGE_FAILED: 'stage_failed',
  ENGINE_FINISHED: 'engine_finished',
  CLASSIFIED: 'classified',
  ABORTED: 'aborted',
  REPORTED: 'reported',
} as const;

export type RunEvent = (typeof RunEvent)[keyof typeof RunEvent];

/**
 * What the CLI asks the pipeline to verify.
 */
export interface RunRequest {
  /** P4 source file */
  sourceFile: string;
  /** Optional forwarding rules passed to the translator */
  rulesFile?: string | undefined;
  /** Symbolic execution budget in seconds */
  engineTimeoutSeconds: number;
}

/**
 * One verification attempt, tracked through the state machine.
 */
export interface PipelineRun {
  id: string;
  request: RunRequest;
  phase: RunPhase;
  /** Epoch ms */
  startedAt: number;
  /** Phases visited, in order, starting with init */
  history: RunPhase[];
  workDir: string;
}

/**
 * Final result of a run, after the report has been written.
 */
export interface RunOutcome {
  runId: string;
  verdict: Verdict;
  /** Process exit code the CLI should use */
  exitCode: 0 | 1;
  /** Report document as emitted */
  report: VerdictReport;
  /** Phases visited, ending in done */
  history: RunPhase[];
  /** Decisive classifier rule; absent when the run failed before the engine */
  ruleId?: string;
}
