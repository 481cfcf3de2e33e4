/**
 * Stage plan: the four external tool invocations of one run and the
 * artifacts that link them.
 *
 * @module pipeline/stages
 */

import { dirname, join, parse } from 'node:path';
import type { StageTimeouts } from '../config/index.js';
import type { Toolchain } from '../config/toolchain.js';

export const StageId = {
  FRONTEND: 'frontend',
  TRANSLATE: 'translate',
  NATIVE: 'native',
  ENGINE: 'engine',
} as const;

export type StageId = (typeof StageId)[keyof typeof StageId];

export const STAGE_LABELS: Record<StageId, string> = {
  [StageId.FRONTEND]: 'P4C Compilation',
  [StageId.TRANSLATE]: 'P4 to C Translation',
  [StageId.NATIVE]: 'Clang Compilation',
  [StageId.ENGINE]: 'KLEE Execution',
};

/**
 * Files produced inside the run's work directory.
 */
export interface ArtifactSet {
  /** Front-end JSON intermediate representation */
  irFile: string;
  /** Generated C source */
  cFile: string;
  /** LLVM bitcode */
  bitcodeFile: string;
  /** Engine output directory, holds evidence files */
  engineOutDir: string;
}

/**
 * Immutable description of one stage.
 */
export interface StageSpec {
  readonly id: StageId;
  readonly label: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly timeoutSeconds: number;
  /** Files that must exist once the stage exits 0 */
  readonly expectedArtifacts: readonly string[];
  /** Write the process stdout to this file after success */
  readonly captureStdoutTo?: string;
  /** What goes into the run log: full output, or stderr only when stdout is an artifact */
  readonly logStream: 'combined' | 'stderr';
}

export interface StagePlan {
  /** Stages 1-3; any failure ends the run */
  build: readonly StageSpec[];
  /** Stage 4; always followed by classification */
  engine: StageSpec;
}

export interface StagePlanInput {
  sourceFile: string;
  rulesFile?: string | undefined;
  artifacts: ArtifactSet;
  toolchain: Toolchain;
  translatorPath: string;
  timeouts: StageTimeouts;
}

/**
 * Derive artifact paths from the source file's base name.
 */
export function deriveArtifacts(workDir: string, sourceFile: string): ArtifactSet {
  const base = parse(sourceFile).name;
  return {
    irFile: join(workDir, `${base}.json`),
    cFile: join(workDir, `${base}.c`),
    bitcodeFile: join(workDir, `${base}.bc`),
    engineOutDir: join(workDir, 'klee-out'),
  };
}

export function buildStagePlan(input: StagePlanInput): StagePlan {
  const { artifacts, toolchain, timeouts } = input;
  const translatorScript = toolchain.translate.script ?? input.translatorPath;

  const frontend: StageSpec = {
    id: StageId.FRONTEND,
    label: STAGE_LABELS[StageId.FRONTEND],
    command: toolchain.frontend.command,
    args: [...toolchain.frontend.extraArgs, input.sourceFile, '--toJSON', artifacts.irFile],
    timeoutSeconds: timeouts.frontendSeconds,
    expectedArtifacts: [artifacts.irFile],
    logStream: 'combined',
  };

  const translateArgs = [...toolchain.translate.extraArgs, translatorScript, artifacts.irFile];
  if (input.rulesFile) {
    translateArgs.push(input.rulesFile);
  }

  const translate: StageSpec = {
    id: StageId.TRANSLATE,
    label: STAGE_LABELS[StageId.TRANSLATE],
    command: toolchain.translate.command,
    args: translateArgs,
    // The translator resolves its templates relative to its own directory
    cwd: dirname(translatorScript),
    timeoutSeconds: timeouts.translateSeconds,
    expectedArtifacts: [artifacts.cFile],
    captureStdoutTo: artifacts.cFile,
    logStream: 'stderr',
  };

  const native: StageSpec = {
    id: StageId.NATIVE,
    label: STAGE_LABELS[StageId.NATIVE],
    command: toolchain.native.command,
    args: [
      '-emit-llvm',
      '-g',
      '-c',
      ...toolchain.native.extraArgs,
      artifacts.cFile,
      '-o',
      artifacts.bitcodeFile,
    ],
    timeoutSeconds: timeouts.nativeSeconds,
    expectedArtifacts: [artifacts.bitcodeFile],
    logStream: 'combined',
  };

  const engine: StageSpec = {
    id: StageId.ENGINE,
    label: STAGE_LABELS[StageId.ENGINE],
    command: toolchain.engine.command,
    args: [
      `--search=${toolchain.engine.searchStrategy}`,
      `--output-dir=${artifacts.engineOutDir}`,
      ...toolchain.engine.extraArgs,
      artifacts.bitcodeFile,
    ],
    timeoutSeconds: timeouts.engineSeconds,
    // The engine may stop before creating its output directory
    expectedArtifacts: [],
    logStream: 'combined',
  };

  return { build: [frontend, translate, native], engine };
}

/**
 * Format one labelled entry of the cumulative run log.
 */
export function formatLogEntry(label: string, body: string): string {
  return `=== ${label} ===\n${body}`;
}
