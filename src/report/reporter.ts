/**
 * Result Reporter
 *
 * Turns the outcome of a run into the single JSON document written to
 * stdout. Emitting never throws: if the report cannot be assembled or
 * written, a minimal error document takes its place.
 */

import {
  Verdict,
  verdictReportSchema,
  type VerdictReport,
  type CliErrorDocument,
} from '../types/verdict.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('reporter');

/**
 * Sink for one serialized document (without trailing newline).
 */
export type OutputWriter = (line: string) => void;

export const stdoutWriter: OutputWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

export const stderrWriter: OutputWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface ReportInput {
  verdict: Verdict;
  /** Epoch ms when the run started */
  startedAt: number;
  /** Epoch ms when the verdict was reached */
  finishedAt: number;
  /** Labelled stage log entries, in stage order */
  log: readonly string[];
  /** Evidence texts; omitted from the document when empty */
  evidence: readonly string[];
}

export function elapsedMs(startedAt: number, finishedAt: number): number {
  return Math.max(0, Math.floor(finishedAt - startedAt));
}

/**
 * Build and validate the report document.
 */
export function buildReport(input: ReportInput): VerdictReport {
  const report: VerdictReport = {
    verdict: input.verdict,
    time_ms: elapsedMs(input.startedAt, input.finishedAt),
    details: input.log.join('\n'),
  };

  if (input.evidence.length > 0) {
    report.assertion_errors = [...input.evidence];
  }

  return verdictReportSchema.parse(report);
}

export class ResultReporter {
  constructor(private readonly write: OutputWriter = stdoutWriter) {}

  /**
   * Emit the report for a finished run and return what was written.
   */
  emit(input: ReportInput): VerdictReport {
    try {
      const report = buildReport(input);
      this.write(JSON.stringify(report));
      return report;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ error: message }, 'Report assembly failed');

      const fallback: VerdictReport = {
        verdict: Verdict.ERROR,
        time_ms: elapsedMs(input.startedAt, input.finishedAt),
        details: `Report assembly failed: ${message}`,
      };
      try {
        this.write(JSON.stringify(fallback));
      } catch (writeError) {
        log.error({ error: writeError }, 'Failed to write fallback report');
      }
      return fallback;
    }
  }

  /**
   * Emit the document used when a run cannot even start.
   */
  emitCliError(message: string): CliErrorDocument {
    const document: CliErrorDocument = { error: message, verdict: Verdict.ERROR };
    try {
      this.write(JSON.stringify(document));
    } catch (error) {
      log.error({ error }, 'Failed to write error document');
    }
    return document;
  }
}
