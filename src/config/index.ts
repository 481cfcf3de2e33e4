/**
 * p4verdict Configuration Module
 *
 * Reads stage timeouts and filesystem locations from environment
 * variables, with validation and defaults. Nothing here is cached:
 * every run builds its own configuration value and threads it through.
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Default location of the P4-to-C translator script inside the toolchain image.
 */
export const DEFAULT_TRANSLATOR_PATH = '/assert-p4/src/P4_to_C.py';

/**
 * Symbolic execution budget in seconds (1s - 24h). Shared by the
 * environment setting and the per-run CLI argument.
 */
export const engineTimeoutSchema = z.coerce.number().int().min(1).max(86400);

/**
 * Per-stage timeout schema, in seconds
 */
const timeoutsSchema = z.object({
  /** Front-end compile (1s - 1h) */
  frontendSeconds: z.coerce.number().int().min(1).max(3600).default(60),
  /** IR to C translation (1s - 1h) */
  translateSeconds: z.coerce.number().int().min(1).max(3600).default(120),
  /** C to bitcode compile (1s - 1h) */
  nativeSeconds: z.coerce.number().int().min(1).max(3600).default(60),
  /** Overridable per run from the CLI */
  engineSeconds: engineTimeoutSchema.default(300),
});

export type StageTimeouts = z.infer<typeof timeoutsSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  timeouts: timeoutsSchema,
  // Directory under which per-run work directories are created
  workRoot: z.string().min(1).default(() => tmpdir()),
  translatorPath: z.string().min(1).default(DEFAULT_TRANSLATOR_PATH),
  // Optional YAML file overriding tool commands
  toolchainFile: z.string().min(1).optional(),
});

export type VerifierConfig = z.infer<typeof configSchema>;

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigValidationError extends Error {
  readonly name = 'ConfigValidationError';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): VerifierConfig {
  const raw = {
    timeouts: {
      frontendSeconds: process.env.P4VERDICT_FRONTEND_TIMEOUT_SECONDS,
      translateSeconds: process.env.P4VERDICT_TRANSLATE_TIMEOUT_SECONDS,
      nativeSeconds: process.env.P4VERDICT_NATIVE_TIMEOUT_SECONDS,
      engineSeconds: process.env.P4VERDICT_ENGINE_TIMEOUT_SECONDS,
    },
    workRoot: process.env.P4VERDICT_WORK_ROOT,
    translatorPath: process.env.P4VERDICT_TRANSLATOR_PATH,
    toolchainFile: process.env.P4VERDICT_TOOLCHAIN_FILE,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigValidationError(issues);
  }

  log.debug(
    {
      timeouts: result.data.timeouts,
      workRoot: result.data.workRoot,
      toolchainFile: result.data.toolchainFile,
    },
    'Configuration loaded'
  );

  return result.data;
}
