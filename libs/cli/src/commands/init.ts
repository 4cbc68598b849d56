/**
 * Init command
 *
 * Creates the project's .council/ directory.
 */

import { Command } from 'commander';
import { UnknownTargetError, createCouncil, createDefaultRegistry, type CouncilConfig } from '@expert-council/core';
import { resolveProjectRoot } from '../utils/context';
import { color } from '../utils/output';

export interface InitOptions {
  tool?: string;
  cwd?: string;
}

/**
 * Create the council. The primary tool is the requested one, or the only
 * detected one; it stays unset when several or none are detected.
 */
export function runInit(options: InitOptions): { projectRoot: string; config: CouncilConfig; displayName?: string } {
  const projectRoot = resolveProjectRoot(options.cwd);
  const registry = createDefaultRegistry();

  let tool = options.tool;
  if (tool !== undefined && !registry.has(tool)) {
    throw new UnknownTargetError(tool, registry.names());
  }
  if (tool === undefined) {
    const detected = registry.detect(projectRoot);
    if (detected.length === 1) tool = detected[0]?.name;
  }

  const config = createCouncil(projectRoot, tool ? { tool } : {});
  return { projectRoot, config, displayName: tool ? registry.get(tool)?.displayName : undefined };
}

export function createInitCommand(): Command {
  const cmd = new Command('init')
    .description('Create the .council/ directory for this project')
    .option('-t, --tool <name>', 'Primary AI tool (claude, opencode, generic)')
    .option('-C, --cwd <dir>', 'Project directory')
    .action((options: InitOptions) => {
      const { displayName } = runInit(options);

      console.log(`${color.green('✓')} Initialized .council/${displayName ? ` for ${displayName}` : ''}`);
      console.log('');
      console.log('Next steps:');
      console.log('  Add expert files to .council/experts/');
      console.log('  council sync           Sync to AI tool configs');
    });

  return cmd;
}
