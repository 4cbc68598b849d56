/**
 * Claude Code adapter: agents and slash commands under .claude/
 */

import * as path from 'node:path';
import type { Expert } from '../expert/types';
import { assertFormattable } from '../expert/naming';
import { serializeExpert } from '../expert/markdown';
import { readCommandTemplates, readTemplate } from '../templates/loader';
import { dirExists } from '../utils/fs';
import type { PathSet, PerFileAdapter, TemplateSet } from './types';

export class ClaudeAdapter implements PerFileAdapter {
  readonly name = 'claude';
  readonly displayName = 'Claude Code';
  readonly layout = 'per-file';
  readonly fallback = false;

  detect(projectRoot: string): boolean {
    return dirExists(path.join(projectRoot, '.claude'));
  }

  paths(): PathSet {
    return {
      agentsDir: '.claude/agents',
      commandsDir: '.claude/commands',
      deprecatedPaths: [],
    };
  }

  templates(): TemplateSet {
    return {
      installDoc: readTemplate('claude/install.md'),
      commands: readCommandTemplates('claude'),
    };
  }

  /** Claude Code reads the persona file format as-is */
  formatAgent(expert: Expert): string {
    assertFormattable(expert);
    return serializeExpert(expert);
  }

  /** Commands are plain markdown */
  formatCommand(_name: string, _description: string, body: string): string {
    return body;
  }
}
