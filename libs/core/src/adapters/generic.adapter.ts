/**
 * Generic adapter: a single AGENTS.md in the project root.
 * Fallback for projects where no specific tool is detected.
 */

import type { Expert } from '../expert/types';
import { assertFormattable, sourceMarker } from '../expert/naming';
import { readTemplate } from '../templates/loader';
import type { AggregateAdapter, PathSet, TemplateSet } from './types';

const HEADER = [
  '# AGENTS.md - Expert Council',
  '',
  'This file defines expert personas for AI coding assistants.',
  '',
  '## Council Members',
  '',
];

export class GenericAdapter implements AggregateAdapter {
  readonly name = 'generic';
  readonly displayName = 'Generic (AGENTS.md)';
  readonly layout = 'aggregate';
  readonly fallback = true;
  readonly aggregateFile = 'AGENTS.md';

  detect(): boolean {
    return true;
  }

  paths(): PathSet {
    return {
      agentsDir: '.',
      commandsDir: null,
      deprecatedPaths: [],
    };
  }

  templates(): TemplateSet {
    return {
      installDoc: readTemplate('generic/install.md'),
      commands: {},
    };
  }

  /** One member section of AGENTS.md */
  formatAgent(expert: Expert): string {
    assertFormattable(expert);
    const parts = [
      `### ${expert.name}${sourceMarker(expert)}`,
      `- **ID**: ${expert.id}`,
      `- **Focus**: ${expert.focus}`,
      '',
    ];

    const philosophy = expert.philosophy?.trim();
    if (philosophy) {
      parts.push(philosophy, '');
    }

    if (expert.principles && expert.principles.length > 0) {
      parts.push('**Principles:**', ...expert.principles.map((p) => `- ${p}`), '');
    }

    return parts.join('\n');
  }

  /** No commands for the generic target */
  formatCommand(): string {
    return '';
  }

  formatAggregate(experts: Expert[]): string {
    return [...HEADER, ...experts.map((e) => this.formatAgent(e))].join('\n');
  }
}
