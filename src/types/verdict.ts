import { z } from 'zod';

// Verdict
export const Verdict = {
  TRUE: 'true',
  FALSE: 'false',
  UNKNOWN: 'unknown',
  ERROR: 'error',
} as const;

export type Verdict = (typeof Verdict)[keyof typeof Verdict];

export const verdictSchema = z.enum([
  Verdict.TRUE,
  Verdict.FALSE,
  Verdict.UNKNOWN,
  Verdict.ERROR,
]);

/**
 * The single document written to stdout for every verification run.
 *
 * `assertion_errors` is only present when the engine left at least one
 * evidence file behind, so an empty array is rejected.
 */
export const verdictReportSchema = z
  .object({
    verdict: verdictSchema,
    time_ms: z.number().int().nonnegative(),
    details: z.string(),
    assertion_errors: z.array(z.string()).min(1).optional(),
  })
  .strict();

export type VerdictReport = z.infer<typeof verdictReportSchema>;

/**
 * Document emitted when the CLI cannot start a run at all
 * (missing argument, unreadable source).
 */
export const cliErrorDocumentSchema = z
  .object({
    error: z.string().min(1),
    verdict: z.literal(Verdict.ERROR),
  })
  .strict();

export type CliErrorDocument = z.infer<typeof cliErrorDocumentSchema>;
