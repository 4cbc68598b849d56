/**
 * Wiring shared by commands: project root, registry, expert source, sync service
 */

import * as path from 'node:path';
import * as readline from 'node:readline';
import {
  CouncilExpertProvider,
  SyncService,
  createDefaultRegistry,
  type AdapterRegistry,
  type Logger,
} from '@expert-council/core';

export function resolveProjectRoot(cwd?: string): string {
  return path.resolve(cwd ?? process.cwd());
}

export interface CouncilContext {
  projectRoot: string;
  registry: AdapterRegistry;
  experts: CouncilExpertProvider;
  sync: SyncService;
}

export function createContext(projectRoot: string, logger?: Logger): CouncilContext {
  const registry = createDefaultRegistry();
  const experts = new CouncilExpertProvider({ projectRoot });
  return {
    projectRoot,
    registry,
    experts,
    sync: new SyncService({ projectRoot, registry, experts, logger }),
  };
}

/** Ask a yes/no question; anything but y/yes is no */
export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answer = await new Promise<string>((resolve) => {
    rl.question(`${question} [y/N] `, (a) => {
      rl.close();
      resolve(a);
    });
  });
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}
