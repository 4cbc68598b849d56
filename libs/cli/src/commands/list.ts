/**
 * List command
 *
 * Shows the experts a sync would distribute, with where each comes from.
 */

import { Command } from 'commander';
import { sourceMarker, type Expert } from '@expert-council/core';
import { createContext, resolveProjectRoot } from '../utils/context';
import { color } from '../utils/output';

export function formatExpert(expert: Expert): string {
  return `  ${expert.id}  ${expert.name} - ${expert.focus}${color.dim(sourceMarker(expert))}`;
}

export function createListCommand(): Command {
  const cmd = new Command('list')
    .description('List council experts')
    .option('-j, --json', 'Output as JSON')
    .option('-C, --cwd <dir>', 'Project directory')
    .action((options: { json?: boolean; cwd?: string }) => {
      const { experts } = createContext(resolveProjectRoot(options.cwd));
      const result = experts.listExperts();

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      for (const warning of result.warnings) {
        console.log(`${color.yellow('⚠')} ${warning}`);
      }
      if (result.experts.length === 0) {
        console.log('No experts in the council yet.');
        return;
      }
      console.log(color.bold(`Council (${result.experts.length})`));
      for (const expert of result.experts) {
        console.log(formatExpert(expert));
      }
    });

  return cmd;
}
