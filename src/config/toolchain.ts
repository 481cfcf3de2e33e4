/**
 * Toolchain Loader
 *
 * Loads the optional YAML file that names the external tools driven by
 * the pipeline. Every field has a default matching the assert-p4 image,
 * so an absent file and an empty file both yield the stock toolchain.
 *
 * @module config/toolchain
 */

import * as fs from 'node:fs/promises';
import * as YAML from 'yaml';
import { z, ZodError } from 'zod';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('toolchain');

const extraArgsSchema = z.array(z.string()).default([]);

export const toolchainSchema = z
  .object({
    frontend: z
      .object({
        command: z.string().min(1).default('p4c-bm2-ss'),
        extraArgs: extraArgsSchema,
      })
      .strict()
      .default({}),
    translate: z
      .object({
        command: z.string().min(1).default('python'),
        /** Overrides P4VERDICT_TRANSLATOR_PATH when set */
        script: z.string().min(1).optional(),
        extraArgs: extraArgsSchema,
      })
      .strict()
      .default({}),
    native: z
      .object({
        command: z.string().min(1).default('clang'),
        extraArgs: extraArgsSchema,
      })
      .strict()
      .default({}),
    engine: z
      .object({
        command: z.string().min(1).default('klee'),
        searchStrategy: z.string().min(1).default('dfs'),
        extraArgs: z.array(z.string()).default(['--optimize']),
      })
      .strict()
      .default({}),
  })
  .strict();

export type Toolchain = z.infer<typeof toolchainSchema>;

/**
 * Error thrown when the toolchain file does not exist
 */
export class ToolchainNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`Toolchain file not found: ${filePath}`);
    this.name = 'ToolchainNotFoundError';
  }
}

/**
 * Error thrown when the toolchain file is not valid YAML
 */
export class ToolchainParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly cause: Error
  ) {
    super(`Failed to parse YAML in ${filePath}: ${cause.message}`);
    this.name = 'ToolchainParseError';
  }
}

/**
 * Error thrown when the toolchain file fails schema validation
 */
export class ToolchainValidationError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly zodError: ZodError
  ) {
    const issues = zodError.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    super(`Toolchain validation failed for ${filePath}:\n${issues}`);
    this.name = 'ToolchainValidationError';
  }
}

/**
 * The toolchain used when no file is given.
 */
export function defaultToolchain(): Toolchain {
  return toolchainSchema.parse({});
}

/**
 * Parse and validate toolchain YAML text.
 *
 * @param content - Raw YAML
 * @param filePath - Used in error messages only
 */
export function parseToolchain(content: string, filePath: string): Toolchain {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new ToolchainParseError(filePath, err instanceof Error ? err : new Error(String(err)));
  }

  // An empty document parses to null
  const result = toolchainSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ToolchainValidationError(filePath, result.error);
  }
  return result.data;
}

/**
 * Load the toolchain from a YAML file, or the defaults when no path is given.
 */
export async function loadToolchain(filePath?: string): Promise<Toolchain> {
  if (!filePath) {
    return defaultToolchain();
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ToolchainNotFoundError(filePath);
    }
    throw err;
  }

  const toolchain = parseToolchain(content, filePath);
  logger.debug({ filePath }, 'Loaded toolchain file');
  return toolchain;
}
