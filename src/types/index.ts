// Verdict Types
export {
  Verdict,
  verdictSchema,
  verdictReportSchema,
  cliErrorDocumentSchema,
  type VerdictReport,
  type CliErrorDocument,
} from './verdict.js';

// Pipeline Types
export {
  RunPhase,
  RunEvent,
  type RunRequest,
  type PipelineRun,
  type RunOutcome,
} from './pipeline.js';
