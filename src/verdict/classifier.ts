import { Verdict } from '../types/verdict.js';
import { VERDICT_RULES, type ClassificationInput, type VerdictRule } from './rules.js';

export interface Classification {
  verdict: Verdict;
  /** Id of the rule that decided, or 'unmatched' */
  ruleId: string;
}

/**
 * Map engine output, timeout flag, exit code and evidence to exactly one verdict.
 */
export function classifyVerdict(
  input: ClassificationInput,
  rules: readonly VerdictRule[] = VERDICT_RULES
): Classification {
  const ordered = [...rules].sort((a, b) => a.priority - b.priority);
  const rule = ordered.find((r) => r.matches(input));

  if (!rule) {
    return { verdict: Verdict.ERROR, ruleId: 'unmatched' };
  }

  return { verdict: rule.verdict, ruleId: rule.id };
}
