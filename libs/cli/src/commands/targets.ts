/**
 * Targets command
 *
 * Lists the registered AI tool adapters and which ones the project uses.
 */

import { Command } from 'commander';
import { createDefaultRegistry, type PathSet } from '@expert-council/core';
import { resolveProjectRoot } from '../utils/context';
import { color } from '../utils/output';

export interface TargetInfo {
  name: string;
  displayName: string;
  layout: 'per-file' | 'aggregate';
  fallback: boolean;
  detected: boolean;
  paths: PathSet;
}

export function listTargets(projectRoot: string): TargetInfo[] {
  return createDefaultRegistry()
    .all()
    .map((adapter) => ({
      name: adapter.name,
      displayName: adapter.displayName,
      layout: adapter.layout,
      fallback: adapter.fallback,
      detected: !adapter.fallback && adapter.detect(projectRoot),
      paths: adapter.paths(),
    }));
}

export function formatTargets(targets: TargetInfo[]): string[] {
  const width = Math.max(...targets.map((t) => t.name.length));
  return targets.map((t) => {
    const state = t.fallback ? color.dim('fallback') : t.detected ? color.green('detected') : color.dim('not detected');
    return `  ${t.name.padEnd(width)}  ${t.displayName.padEnd(20)}  ${state}`;
  });
}

export function createTargetsCommand(): Command {
  const cmd = new Command('targets')
    .description('List supported AI tools and whether this project uses them')
    .option('-j, --json', 'Output as JSON')
    .option('-C, --cwd <dir>', 'Project directory')
    .action((options: { json?: boolean; cwd?: string }) => {
      const targets = listTargets(resolveProjectRoot(options.cwd));
      if (options.json) {
        console.log(JSON.stringify(targets, null, 2));
        return;
      }
      console.log(color.bold('Targets'));
      for (const line of formatTargets(targets)) {
        console.log(line);
      }
    });

  return cmd;
}
