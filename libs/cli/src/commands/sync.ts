/**
 * Sync command
 *
 * Distributes the council's experts to the project's AI tools.
 */

import { Command } from 'commander';
import { loadConfig, type SyncReport } from '@expert-council/core';
import { createContext, resolveProjectRoot } from '../utils/context';
import { createConsoleLogger } from '../utils/logger';
import { formatSyncReport, printLines, reportFailed, toJsonReport } from '../utils/output';

export interface SyncCommandOptions {
  dryRun?: boolean;
  clean?: boolean;
  force?: boolean;
  json?: boolean;
  cwd?: string;
  verbose?: boolean;
}

/**
 * Run a sync for one target or every resolved target.
 * Configuration errors throw; target and file failures are in the report.
 */
export function runSync(target: string | undefined, options: SyncCommandOptions): SyncReport {
  const projectRoot = resolveProjectRoot(options.cwd);
  const config = loadConfig(projectRoot);
  const { sync } = createContext(projectRoot, createConsoleLogger(options.verbose));

  const syncOptions = { dryRun: options.dryRun, clean: options.clean, force: options.force };
  return target ? sync.syncTarget(target, config, syncOptions) : sync.syncAll(config, syncOptions);
}

export function createSyncCommand(): Command {
  const cmd = new Command('sync')
    .description('Write the council to every configured or detected AI tool')
    .argument('[target]', 'Sync a single target (claude, opencode, generic)')
    .option('-n, --dry-run', 'Show what would change without writing')
    .option('--clean', 'Delete stale generated files and deprecated paths')
    .option('-f, --force', 'Overwrite or delete files edited since the last sync or not created by council')
    .option('-j, --json', 'Output the report as JSON')
    .option('-C, --cwd <dir>', 'Project directory')
    .option('-v, --verbose', 'Log each file operation')
    .action((target: string | undefined, options: SyncCommandOptions) => {
      const report = runSync(target, options);

      if (options.json) {
        console.log(JSON.stringify(toJsonReport(report), null, 2));
      } else {
        printLines(formatSyncReport(report));
      }

      if (reportFailed(report)) {
        process.exitCode = 1;
      }
    });

  return cmd;
}
