/**
 * Desired state: the files a target should contain for a set of experts
 */

import { errorMessage } from '../errors';
import { agentFilename } from '../expert/naming';
import type { Expert } from '../expert/types';
import { REVIEW_COMMAND, renderReviewCommand, reviewCommandTemplate } from '../templates/review';
import type { Adapter } from '../adapters/types';
import type { DesiredFile, FileError } from './types';
import { byPath, relativeJoin } from './utils';

const COMMAND_DESCRIPTIONS: Record<string, string> = {
  [REVIEW_COMMAND.name]: REVIEW_COMMAND.description,
  'council-add': 'Add expert to council with AI-generated content',
  'council-detect': 'Detect project stack and suggest experts',
  'council-remove': 'Remove expert from council',
};

/** Description of a command; unknown commands are described by their name */
export function commandDescription(name: string): string {
  return COMMAND_DESCRIPTIONS[name] ?? name;
}

export interface DesiredSet {
  /** Sorted by path */
  files: DesiredFile[];
  errors: FileError[];
}

/**
 * Compute every file a target should contain.
 *
 * @param enabledCommands - command names to generate; all bundled commands and
 *   the review command when undefined
 */
export function computeDesiredFiles(adapter: Adapter, experts: Expert[], enabledCommands?: string[]): DesiredSet {
  const files = new Map<string, DesiredFile>();
  const errors: FileError[] = [];
  const { agentsDir, commandsDir } = adapter.paths();

  const add = (file: DesiredFile, expertId?: string) => {
    if (files.has(file.path)) {
      errors.push({
        path: file.path,
        operation: 'format',
        message: `duplicate output for expert '${expertId ?? ''}'; keeping the first`,
      });
      return;
    }
    files.set(file.path, file);
  };

  // Agents: only records that format cleanly go further
  const formatted: Expert[] = [];
  for (const expert of experts) {
    const agentPath = relativeJoin(agentsDir, agentFilename(expert));
    try {
      const content = adapter.formatAgent(expert);
      formatted.push(expert);
      if (adapter.layout === 'per-file') {
        add({ path: agentPath, content, kind: 'agent' }, expert.id);
      }
    } catch (err) {
      errors.push({
        path: adapter.layout === 'aggregate' ? adapter.aggregateFile : agentPath,
        operation: 'format',
        message: errorMessage(err),
      });
    }
  }

  if (adapter.layout === 'aggregate') {
    add({ path: adapter.aggregateFile, content: adapter.formatAggregate(formatted), kind: 'aggregate' });
  }

  // Commands
  if (adapter.layout === 'per-file' && commandsDir !== null) {
    const isEnabled = (name: string) => enabledCommands === undefined || enabledCommands.includes(name);

    if (isEnabled(REVIEW_COMMAND.name)) {
      const body = renderReviewCommand(reviewCommandTemplate(), formatted);
      addCommand(adapter, commandsDir, REVIEW_COMMAND.name, body, add);
    }

    const bundled = adapter.templates().commands;
    for (const name of Object.keys(bundled).sort()) {
      if (name === REVIEW_COMMAND.name || !isEnabled(name)) continue;
      addCommand(adapter, commandsDir, name, bundled[name], add);
    }
  }

  return {
    files: Array.from(files.values()).sort(byPath),
    errors,
  };
}

function addCommand(
  adapter: Adapter,
  commandsDir: string,
  name: string,
  body: string,
  add: (file: DesiredFile) => void,
): void {
  const content = adapter.formatCommand(name, commandDescription(name), body);
  if (!content) return;
  add({ path: relativeJoin(commandsDir, `${name}.md`), content, kind: 'command' });
}
