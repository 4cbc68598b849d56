/**
 * Program definition, separate from the entry point so tests can drive it.
 */

import { Command } from 'commander';
import {
  createInitCommand,
  createListCommand,
  createSyncCommand,
  createTargetsCommand,
  createUninstallCommand,
} from './commands';

export const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('council')
    .description('Expert council - keep AI coding tools in sync with your review personas')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText(
      'after',
      `
Examples:
  $ council init                 Create .council/ for this project
  $ council sync                 Sync every configured or detected tool
  $ council sync claude -n       Preview changes for Claude Code
  $ council sync --clean         Also remove stale and deprecated files
  $ council targets              Show supported tools
  $ council list                 Show council experts
  $ council uninstall            Remove generated files
`
    );

  program.addCommand(createInitCommand());
  program.addCommand(createSyncCommand());
  program.addCommand(createTargetsCommand());
  program.addCommand(createListCommand());
  program.addCommand(createUninstallCommand());

  return program;
}
