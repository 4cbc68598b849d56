/**
 * OpenCode adapter: subagents and commands under .opencode/
 *
 * OpenCode moved agents from `.opencode/agent` to `.opencode/agents`; the old
 * directory is declared deprecated so a clean sync removes it.
 */

import * as path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import type { Expert } from '../expert/types';
import { assertFormattable } from '../expert/naming';
import { personaIntro, personaSections } from '../expert/markdown';
import { readCommandTemplates, readTemplate } from '../templates/loader';
import { dirExists, fileExists } from '../utils/fs';
import type { PathSet, PerFileAdapter, TemplateSet } from './types';

function frontmatter(description: string): string {
  return `---\n${stringifyYaml({ description, mode: 'subagent' }, { lineWidth: 0 })}---\n`;
}

export class OpenCodeAdapter implements PerFileAdapter {
  readonly name = 'opencode';
  readonly displayName = 'OpenCode';
  readonly layout = 'per-file';
  readonly fallback = false;

  detect(projectRoot: string): boolean {
    return dirExists(path.join(projectRoot, '.opencode')) || fileExists(path.join(projectRoot, 'opencode.json'));
  }

  paths(): PathSet {
    return {
      agentsDir: '.opencode/agents',
      commandsDir: '.opencode/commands',
      deprecatedPaths: ['.opencode/agent'],
    };
  }

  templates(): TemplateSet {
    return {
      installDoc: readTemplate('opencode/install.md'),
      commands: readCommandTemplates('opencode'),
    };
  }

  formatAgent(expert: Expert): string {
    assertFormattable(expert);
    const lines = [
      frontmatter(expert.focus),
      `# ${expert.name}`,
      '',
      personaIntro(expert),
      '',
      ...personaSections(expert),
    ];
    return `${lines.join('\n')}\n`;
  }

  formatCommand(_name: string, description: string, body: string): string {
    return `${frontmatter(description)}\n${body}`;
  }
}
