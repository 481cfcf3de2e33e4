/**
 * p4verdict Library API
 *
 * Exports the pipeline for programmatic use as a verification oracle.
 */

// Types
export * from './types/index.js';

// Pipeline
export { PipelineOrchestrator, type OrchestratorOptions, type RunOptions } from './pipeline/orchestrator.js';
export {
  StageId,
  STAGE_LABELS,
  buildStagePlan,
  deriveArtifacts,
  formatLogEntry,
  type ArtifactSet,
  type StageSpec,
  type StagePlan,
} from './pipeline/stages.js';
export {
  PipelineError,
  CompilationFailureError,
  InfrastructureTimeoutError,
  StageExecutionError,
  RunAbortedError,
} from './pipeline/errors.js';
export {
  applyTransition,
  canTransition,
  getNextPhase,
  isTerminalPhase,
  InvalidTransitionError,
} from './pipeline/state-machine.js';

// Stage execution
export { ProcessStageRunner, StageSpawnError, MAX_STAGE_TIMEOUT_SECONDS } from './sandbox/stage-runner.js';
export {
  StageStatus,
  type StageCommand,
  type StageResult,
  type StageExecutor,
} from './sandbox/types.js';

// Evidence and verdicts
export { scanEvidence, EVIDENCE_FILE_SUFFIX, type EvidenceScan } from './evidence/scanner.js';
export { classifyVerdict, type Classification } from './verdict/classifier.js';
export {
  VERDICT_RULES,
  ASSERTION_FAILURE_MARKER,
  ABORT_FAILURE_MARKER,
  COMPLETION_MARKER,
  type ClassificationInput,
  type VerdictRule,
} from './verdict/rules.js';

// Reporting
export { ResultReporter, buildReport, type OutputWriter, type ReportInput } from './report/reporter.js';

// Configuration
export { loadConfig, ConfigValidationError, type VerifierConfig, type StageTimeouts } from './config/index.js';
export {
  loadToolchain,
  parseToolchain,
  defaultToolchain,
  type Toolchain,
} from './config/toolchain.js';

// Work directories
export { withWorkDir, cleanupStaleWorkDirs, WORK_DIR_PREFIX } from './utils/temp.js';
