/**
 * State machine for a verification run.
 *
 * init → frontend → translate → native → engine → classify → report → done,
 * with a side edge from any build stage straight to report on failure.
 * The engine stage always proceeds to classification, timeout or not.
 */

import { RunPhase, RunEvent, type PipelineRun } from '../types/pipeline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

/**
 * State transition table.
 * Maps (current phase, event) -> next phase
 */
const transitions: Record<RunPhase, Partial<Record<RunEvent, RunPhase>>> = {
  [RunPhase.INIT]: {
    [RunEvent.STARTED]: RunPhase.FRONTEND,
  },
  [RunPhase.FRONTEND]: {
    [RunEvent.STAGE_SUCCEEDED]: RunPhase.TRANSLATE,
    [RunEvent.STAGE_FAILED]: RunPhase.REPORT,
    [RunEvent.ABORTED]: RunPhase.REPORT,
  },
  [RunPhase.TRANSLATE]: {
    [RunEvent.STAGE_SUCCEEDED]: RunPhase.NATIVE,
    [RunEvent.STAGE_FAILED]: RunPhase.REPORT,
    [RunEvent.ABORTED]: RunPhase.REPORT,
  },
  [RunPhase.NATIVE]: {
    [RunEvent.STAGE_SUCCEEDED]: RunPhase.ENGINE,
    [RunEvent.STAGE_FAILED]: RunPhase.REPORT,
    [RunEvent.ABORTED]: RunPhase.REPORT,
  },
  [RunPhase.ENGINE]: {
    [RunEvent.ENGINE_FINISHED]: RunPhase.CLASSIFY,
    [RunEvent.ABORTED]: RunPhase.REPORT,
  },
  [RunPhase.CLASSIFY]: {
    [RunEvent.CLASSIFIED]: RunPhase.REPORT,
  },
  [RunPhase.REPORT]: {
    [RunEvent.REPORTED]: RunPhase.DONE,
  },
  // Terminal
  [RunPhase.DONE]: {},
};

/**
 * Error thrown for a transition the table does not allow.
 */
export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';
  readonly phase: RunPhase;
  readonly event: RunEvent;

  constructor(phase: RunPhase, event: RunEvent) {
    super(`Invalid transition: ${phase} + ${event}`);
    this.phase = phase;
    this.event = event;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

export function isTerminalPhase(phase: RunPhase): boolean {
  return phase === RunPhase.DONE;
}

/**
 * Check if a transition is valid.
 */
export function canTransition(currentPhase: RunPhase, event: RunEvent): boolean {
  return event in transitions[currentPhase];
}

/**
 * Get the next phase for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextPhase(currentPhase: RunPhase, event: RunEvent): RunPhase | null {
  return transitions[currentPhase][event] ?? null;
}

/**
 * Apply a transition to a run.
 * Returns the updated run or throws if the transition is invalid.
 */
export function applyTransition(run: PipelineRun, event: RunEvent): PipelineRun {
  const nextPhase = getNextPhase(run.phase, event);

  if (nextPhase === null) {
    log.error({ runId: run.id, currentPhase: run.phase, event }, 'Invalid transition');
    throw new InvalidTransitionError(run.phase, event);
  }

  log.debug({ runId: run.id, from: run.phase, event, to: nextPhase }, 'Phase transition');

  return {
    ...run,
    phase: nextPhase,
    history: [...run.history, nextPhase],
  };
}
