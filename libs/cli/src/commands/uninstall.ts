/**
 * Uninstall command
 *
 * Removes every location a sync may have generated, for all targets.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { errorMessage } from '@expert-council/core';
import { confirm, createContext, resolveProjectRoot } from '../utils/context';
import { color } from '../utils/output';

export interface UninstallOptions {
  dryRun?: boolean;
  yes?: boolean;
  cwd?: string;
}

/** Generated locations that exist in the project */
export function findInstalledPaths(projectRoot: string): string[] {
  return createContext(projectRoot)
    .sync.allCleanPaths()
    .filter((p) => fs.existsSync(path.join(projectRoot, p)));
}

async function runUninstall(options: UninstallOptions): Promise<void> {
  const projectRoot = resolveProjectRoot(options.cwd);
  const paths = findInstalledPaths(projectRoot);

  if (paths.length === 0) {
    console.log('Nothing to remove.');
    return;
  }

  console.log(options.dryRun ? 'Would remove:' : 'This will remove:');
  for (const p of paths) {
    console.log(`  ${color.yellow('->')} ${p}`);
  }
  if (options.dryRun) return;

  if (!options.yes && !(await confirm('Remove these paths?'))) {
    console.log('Uninstall cancelled.');
    return;
  }

  let failed = false;
  for (const p of paths) {
    try {
      fs.rmSync(path.join(projectRoot, p), { recursive: true, force: true });
      console.log(`${color.green('✓')} removed ${p}`);
    } catch (err) {
      failed = true;
      console.log(`${color.red('✗')} ${p}: ${errorMessage(err)}`);
    }
  }
  if (failed) process.exitCode = 1;
}

export function createUninstallCommand(): Command {
  const cmd = new Command('uninstall')
    .description('Remove generated agent, command and AGENTS.md files for every tool')
    .option('-n, --dry-run', 'List what would be removed')
    .option('-y, --yes', 'Skip confirmation prompt')
    .option('-C, --cwd <dir>', 'Project directory')
    .action(async (options: UninstallOptions) => {
      await runUninstall(options);
    });

  return cmd;
}
