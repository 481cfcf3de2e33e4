/**
 * Pipeline Orchestrator
 *
 * Runs the four stages of one verification in order inside a scoped work
 * directory, then scans for evidence, classifies and reports. Build
 * stage failures end the run with verdict `error` and exit code 1; once
 * the engine has run the exit code is 0 whatever the verdict.
 *
 * @module pipeline/orchestrator
 */

import { stat, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { nanoid } from 'nanoid';
import type { VerifierConfig } from '../config/index.js';
import type { Toolchain } from '../config/toolchain.js';
import { scanEvidence } from '../evidence/scanner.js';
import { ResultReporter } from '../report/reporter.js';
import { ProcessStageRunner } from '../sandbox/stage-runner.js';
import { StageStatus, type StageCommand, type StageExecutor, type StageResult } from '../sandbox/types.js';
import { RunEvent, RunPhase, type PipelineRun, type RunOutcome, type RunRequest } from '../types/pipeline.js';
import { Verdict } from '../types/verdict.js';
import { createLogger } from '../utils/logger.js';
import { withWorkDir } from '../utils/temp.js';
import { classifyVerdict } from '../verdict/classifier.js';
import {
  CompilationFailureError,
  InfrastructureTimeoutError,
  PipelineError,
  RunAbortedError,
  StageExecutionError,
} from './errors.js';
import { buildStagePlan, deriveArtifacts, formatLogEntry, type StageSpec } from './stages.js';
import { applyTransition } from './state-machine.js';

const log = createLogger('orchestrator');

export interface OrchestratorOptions {
  config: VerifierConfig;
  toolchain: Toolchain;
  /** Defaults to spawning real processes */
  executor?: StageExecutor;
  /** Defaults to writing to stdout */
  reporter?: ResultReporter;
  /** Clock used for elapsed time, epoch ms */
  now?: () => number;
}

export interface RunOptions {
  /** Aborting kills the running stage and ends the run with `error` */
  signal?: AbortSignal;
}

/**
 * What the engine stage left for the classifier.
 */
interface EngineRun {
  output: string;
  timedOut: boolean;
  exitCode: number | null;
  aborted: boolean;
}

interface RunConclusion {
  verdict: Verdict;
  exitCode: 0 | 1;
  log: readonly string[];
  evidence: readonly string[];
  ruleId?: string;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function toStageCommand(spec: StageSpec, signal?: AbortSignal): StageCommand {
  const command: StageCommand = {
    command: spec.command,
    args: [...spec.args],
    timeoutSeconds: spec.timeoutSeconds,
  };
  if (spec.cwd !== undefined) {
    command.cwd = spec.cwd;
  }
  if (signal) {
    command.signal = signal;
  }
  return command;
}

export class PipelineOrchestrator {
  private readonly config: VerifierConfig;
  private readonly toolchain: Toolchain;
  private readonly executor: StageExecutor;
  private readonly reporter: ResultReporter;
  private readonly now: () => number;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.toolchain = options.toolchain;
    this.executor = options.executor ?? new ProcessStageRunner();
    this.reporter = options.reporter ?? new ResultReporter();
    this.now = options.now ?? Date.now;
  }

  /**
   * Verify one source file and emit its report.
   * Never rejects: unexpected failures are reported as verdict `error`.
   */
  async run(request: RunRequest, options: RunOptions = {}): Promise<RunOutcome> {
    const runId = nanoid(10);
    const startedAt = this.now();
    const workRoot = resolve(this.config.workRoot);

    try {
      return await withWorkDir(workRoot, (workDir) =>
        this.execute(runId, startedAt, workDir, request, options.signal)
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ runId, error: message }, 'Unexpected pipeline error');

      const report = this.reporter.emit({
        verdict: Verdict.ERROR,
        startedAt,
        finishedAt: this.now(),
        log: [`Pipeline error: ${message}`],
        evidence: [],
      });
      return { runId, verdict: Verdict.ERROR, exitCode: 1, report, history: [] };
    }
  }

  private async execute(
    runId: string,
    startedAt: number,
    workDir: string,
    request: RunRequest,
    signal: AbortSignal | undefined
  ): Promise<RunOutcome> {
    let run: PipelineRun = {
      id: runId,
      request,
      phase: RunPhase.INIT,
      startedAt,
      history: [RunPhase.INIT],
      workDir,
    };
    const stageLog: string[] = [];

    log.info(
      {
        runId,
        sourceFile: request.sourceFile,
        rulesFile: request.rulesFile,
        engineTimeoutSeconds: request.engineTimeoutSeconds,
      },
      'Starting verification run'
    );

    const sourceFile = resolve(request.sourceFile);
    const artifacts = deriveArtifacts(workDir, sourceFile);
    const plan = buildStagePlan({
      sourceFile,
      rulesFile: await this.resolveRulesFile(request.rulesFile),
      artifacts,
      toolchain: this.toolchain,
      translatorPath: this.config.translatorPath,
      timeouts: { ...this.config.timeouts, engineSeconds: request.engineTimeoutSeconds },
    });

    run = applyTransition(run, RunEvent.STARTED);

    for (const spec of plan.build) {
      try {
        await this.runBuildStage(spec, stageLog, signal);
      } catch (error) {
        if (!(error instanceof PipelineError)) {
          throw error;
        }
        log.warn({ runId, stage: error.stage, error: error.name }, 'Build stage failed, ending run');
        run = applyTransition(
          run,
          error instanceof RunAbortedError ? RunEvent.ABORTED : RunEvent.STAGE_FAILED
        );
        return this.finish(run, {
          verdict: Verdict.ERROR,
          exitCode: 1,
          log: [error.details],
          evidence: [],
        });
      }
      run = applyTransition(run, RunEvent.STAGE_SUCCEEDED);
    }

    const engine = await this.runEngineStage(plan.engine, stageLog, signal);

    if (engine.aborted) {
      const aborted = new RunAbortedError(plan.engine.id, plan.engine.label);
      run = applyTransition(run, RunEvent.ABORTED);
      return this.finish(run, {
        verdict: Verdict.ERROR,
        exitCode: 1,
        log: [...stageLog, aborted.details],
        evidence: [],
      });
    }

    run = applyTransition(run, RunEvent.ENGINE_FINISHED);

    const evidence = await scanEvidence(artifacts.engineOutDir);
    const classification = classifyVerdict({
      output: engine.output,
      timedOut: engine.timedOut,
      exitCode: engine.exitCode,
      evidence: evidence.texts,
    });

    log.info(
      {
        runId,
        verdict: classification.verdict,
        rule: classification.ruleId,
        evidenceFiles: evidence.files.length,
        timedOut: engine.timedOut,
      },
      'Run classified'
    );

    run = applyTransition(run, RunEvent.CLASSIFIED);

    return this.finish(run, {
      verdict: classification.verdict,
      exitCode: 0,
      log: stageLog,
      evidence: evidence.texts,
      ruleId: classification.ruleId,
    });
  }

  private finish(run: PipelineRun, conclusion: RunConclusion): RunOutcome {
    const report = this.reporter.emit({
      verdict: conclusion.verdict,
      startedAt: run.startedAt,
      finishedAt: this.now(),
      log: conclusion.log,
      evidence: conclusion.evidence,
    });

    const done = applyTransition(run, RunEvent.REPORTED);

    const outcome: RunOutcome = {
      runId: run.id,
      verdict: report.verdict,
      exitCode: conclusion.exitCode,
      report,
      history: done.history,
    };
    if (conclusion.ruleId !== undefined) {
      outcome.ruleId = conclusion.ruleId;
    }
    return outcome;
  }

  /**
   * The rules file is optional input: one that does not exist is ignored.
   */
  private async resolveRulesFile(rulesFile: string | undefined): Promise<string | undefined> {
    if (rulesFile === undefined) {
      return undefined;
    }

    const absolute = resolve(rulesFile);
    try {
      if ((await stat(absolute)).isFile()) {
        return absolute;
      }
    } catch (error) {
      log.debug({ rulesFile: absolute, error }, 'Cannot stat rules file');
    }

    log.warn({ rulesFile: absolute }, 'Rules file not found, translating without it');
    return undefined;
  }

  private async runBuildStage(
    spec: StageSpec,
    stageLog: string[],
    signal: AbortSignal | undefined
  ): Promise<void> {
    let result: StageResult;
    try {
      result = await this.executor.execute(toStageCommand(spec, signal));
    } catch (error) {
      const failure = new StageExecutionError(spec.id, spec.label, error);
      stageLog.push(formatLogEntry(spec.label, failure.details));
      throw failure;
    }

    // When stdout is the artifact, only stderr is diagnostic
    const diagnostic = spec.logStream === 'stderr' ? result.stderr : result.output;
    stageLog.push(
      formatLogEntry(spec.label, spec.logStream === 'stderr' ? `stderr: ${diagnostic}` : diagnostic)
    );

    switch (result.status) {
      case StageStatus.ABORTED:
        throw new RunAbortedError(spec.id, spec.label);
      case StageStatus.TIMED_OUT:
        throw new InfrastructureTimeoutError(spec.id, spec.label, spec.timeoutSeconds, diagnostic);
      case StageStatus.FAILED:
        throw new CompilationFailureError(spec.id, spec.label, diagnostic);
      case StageStatus.SUCCESS:
        break;
    }

    if (spec.captureStdoutTo !== undefined) {
      try {
        await writeFile(spec.captureStdoutTo, result.stdout, 'utf-8');
      } catch (error) {
        throw new StageExecutionError(spec.id, spec.label, error);
      }
    }

    for (const artifact of spec.expectedArtifacts) {
      if (!(await pathExists(artifact))) {
        throw new CompilationFailureError(spec.id, spec.label, diagnostic, artifact);
      }
    }

    log.debug({ stage: spec.id, durationMs: result.durationMs }, 'Stage succeeded');
  }

  private async runEngineStage(
    spec: StageSpec,
    stageLog: string[],
    signal: AbortSignal | undefined
  ): Promise<EngineRun> {
    let result: StageResult;
    try {
      result = await this.executor.execute(toStageCommand(spec, signal));
    } catch (error) {
      // Not fatal here: the classifier turns a missing exit status into `error`
      const body = `error: ${error instanceof Error ? error.message : String(error)}`;
      stageLog.push(formatLogEntry(spec.label, body));
      return { output: body, timedOut: false, exitCode: null, aborted: false };
    }

    if (result.status === StageStatus.TIMED_OUT) {
      const note = `Timeout after ${spec.timeoutSeconds}s`;
      const body = result.output ? `${result.output}\n${note}` : note;
      stageLog.push(formatLogEntry(`${spec.label} (Timeout)`, body));
      return { output: body, timedOut: true, exitCode: result.exitCode, aborted: false };
    }

    stageLog.push(formatLogEntry(spec.label, result.output));
    return {
      output: result.output,
      timedOut: false,
      exitCode: result.exitCode,
      aborted: result.status === StageStatus.ABORTED,
    };
  }
}
