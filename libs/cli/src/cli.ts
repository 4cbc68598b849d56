#!/usr/bin/env node
/**
 * Council CLI
 *
 * @example
 * ```bash
 * council sync
 * council sync opencode --dry-run
 * council targets --json
 * ```
 */

import { CouncilError, errorMessage } from '@expert-council/core';
import { createProgram } from './program';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const code = err instanceof CouncilError ? ` [${err.code}]` : '';
    console.error(`Error${code}: ${errorMessage(err)}`);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
