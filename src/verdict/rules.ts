/**
 * Verdict rule table.
 *
 * Rules are evaluated in ascending priority; the first match decides.
 * Evidence outranks a timeout: a violation found just before the budget
 * ran out is still a violation.
 */

import { Verdict } from '../types/verdict.js';

export const ASSERTION_FAILURE_MARKER = 'ASSERTION FAIL';
export const ABORT_FAILURE_MARKER = 'abort failure';
export const COMPLETION_MARKER = 'KLEE: done:';

/**
 * Everything the classifier looks at, taken from the engine stage.
 */
export interface ClassificationInput {
  /** Combined engine output (partial if it timed out) */
  output: string;
  timedOut: boolean;
  /** Engine exit code; null when it was killed or never started */
  exitCode: number | null;
  /** Texts of the evidence files found */
  evidence: readonly string[];
}

export interface VerdictRule {
  id: string;
  priority: number;
  description: string;
  verdict: Verdict;
  matches: (input: ClassificationInput) => boolean;
}

export const VERDICT_RULES: readonly VerdictRule[] = [
  {
    id: 'violation',
    priority: 1,
    description: 'Failure marker in engine output or evidence file present',
    verdict: Verdict.FALSE,
    matches: (input) =>
      input.output.includes(ASSERTION_FAILURE_MARKER) ||
      input.output.includes(ABORT_FAILURE_MARKER) ||
      input.evidence.length > 0,
  },
  {
    id: 'timeout',
    priority: 2,
    description: 'Engine exhausted its time budget',
    verdict: Verdict.UNKNOWN,
    matches: (input) => input.timedOut,
  },
  {
    id: 'completed',
    priority: 3,
    description: 'Engine reported exhaustive completion without evidence',
    verdict: Verdict.TRUE,
    matches: (input) => input.output.includes(COMPLETION_MARKER) && input.evidence.length === 0,
  },
  {
    id: 'engine-failure',
    priority: 4,
    description: 'Engine exited with a non-zero status',
    verdict: Verdict.ERROR,
    matches: (input) => input.exitCode !== 0,
  },
  {
    id: 'clean-exit',
    priority: 5,
    description: 'Engine exited cleanly without marker or evidence',
    verdict: Verdict.TRUE,
    matches: () => true,
  },
];
