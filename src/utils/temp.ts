import { mkdir, rm, readdir, stat } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { createLogger } from './logger.js';

const log = createLogger('temp');

/**
 * Prefix of every per-run working directory created under the work root.
 */
export const WORK_DIR_PREFIX = 'p4verdict';

export async function createWorkDir(root: string, prefix: string = WORK_DIR_PREFIX): Promise<string> {
  await mkdir(root, { recursive: true });

  const dirPath = join(root, `${prefix}-${nanoid(8)}`);
  // Not recursive: a name collision must fail instead of sharing a directory
  await mkdir(dirPath);

  log.debug({ dirPath }, 'Created work directory');
  return dirPath;
}

export async function removeWorkDir(root: string, path: string): Promise<void> {
  const normalizedRoot = resolve(root);
  const normalizedPath = resolve(path);

  if (!normalizedPath.startsWith(normalizedRoot + sep)) {
    throw new Error(`Refusing to remove directory outside work root: ${path}`);
  }

  try {
    await rm(normalizedPath, { recursive: true, force: true });
    log.debug({ path: normalizedPath }, 'Removed work directory');
  } catch (error) {
    log.warn({ path: normalizedPath, error }, 'Failed to remove work directory');
  }
}

/**
 * Run `fn` with a freshly created working directory that is removed
 * once `fn` settles, whether it resolved or threw.
 */
export async function withWorkDir<T>(
  root: string,
  fn: (workDir: string) => Promise<T>,
  prefix: string = WORK_DIR_PREFIX
): Promise<T> {
  const workDir = await createWorkDir(root, prefix);
  try {
    return await fn(workDir);
  } finally {
    await removeWorkDir(root, workDir);
  }
}

export async function listWorkDirs(root: string, prefix: string = WORK_DIR_PREFIX): Promise<string[]> {
  try {
    const entries = await readdir(root, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(`${prefix}-`))
      .map((e) => join(root, e.name));
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Remove work directories left behind by runs that were killed
 * before they could clean up (e.g. SIGKILL of the CLI itself).
 */
export async function cleanupStaleWorkDirs(
  root: string,
  maxAgeMs: number,
  now: number = Date.now()
): Promise<number> {
  const dirs = await listWorkDirs(root);
  let cleaned = 0;

  for (const dir of dirs) {
    try {
      const stats = await stat(dir);
      const age = now - stats.mtimeMs;

      if (age > maxAgeMs) {
        await removeWorkDir(root, dir);
        cleaned++;
      }
    } catch (error) {
      log.warn({ dir, error }, 'Error checking work directory age');
    }
  }

  if (cleaned > 0) {
    log.info({ cleaned }, 'Cleaned up stale work directories');
  }

  return cleaned;
}
