#!/usr/bin/env node

// Side-effect import: .env must be loaded before the logger reads its level
import 'dotenv/config';

import { runCli } from './control-plane/cli.js';

/**
 * Main entry point for the p4verdict CLI.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    console.error(
      'Fatal error:',
      error instanceof Error ? error.message : String(error)
    );
    process.exitCode = 1;
  }
}

void main();
