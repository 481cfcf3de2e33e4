/**
 * Evidence Scanner
 *
 * Collects the assertion-failure records the execution engine writes
 * into its output directory. Reading is best-effort: a record that
 * vanished or cannot be decoded is skipped, never fatal.
 */

import { readFile, stat } from 'node:fs/promises';
import fg from 'fast-glob';
import { createLogger } from '../utils/logger.js';

const log = createLogger('evidence-scanner');

/**
 * Suffix of the engine's per-violation evidence files.
 */
export const EVIDENCE_FILE_SUFFIX = '.assert.err';

export interface EvidenceScan {
  /** Absolute paths of the files that were read, in name order */
  files: string[];
  /** Full text of each file, aligned with `files` */
  texts: string[];
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read every evidence file in the engine output directory.
 *
 * @param outputDir - Engine output directory; may not exist
 */
export async function scanEvidence(outputDir: string): Promise<EvidenceScan> {
  const scan: EvidenceScan = { files: [], texts: [] };

  if (!(await isDirectory(outputDir))) {
    log.debug({ outputDir }, 'Engine output directory absent, no evidence');
    return scan;
  }

  const matches = await fg(`*${EVIDENCE_FILE_SUFFIX}`, {
    cwd: outputDir,
    absolute: true,
    onlyFiles: true,
    dot: true,
  });
  matches.sort();

  for (const file of matches) {
    try {
      const text = await readFile(file, 'utf-8');
      scan.files.push(file);
      scan.texts.push(text);
    } catch (error) {
      log.debug({ file, error }, 'Skipping unreadable evidence file');
    }
  }

  log.debug({ outputDir, count: scan.files.length }, 'Evidence scan complete');
  return scan;
}
