/**
 * Expert naming helpers: ids, provenance-prefixed filenames and markers
 */

import { ExpertFormatError } from '../errors';
import { FormattableExpertSchema } from './expert.schema';
import type { Expert, Provenance } from './types';

export function isInstalledSource(source: Provenance | undefined): source is `installed:${string}` {
  return source !== undefined && source.startsWith('installed:');
}

/**
 * Filename of an expert's agent file. Prefixing by provenance keeps a project
 * expert and a personal or installed one with the same id apart.
 */
export function agentFilename(expert: Expert): string {
  if (expert.source === 'custom') return `custom-${expert.id}.md`;
  if (isInstalledSource(expert.source)) return `installed-${expert.id}.md`;
  return `${expert.id}.md`;
}

/** Display marker appended to an expert's name in aggregate documents */
export function sourceMarker(expert: Expert): string {
  if (expert.source === 'custom') return ' [custom]';
  if (isInstalledSource(expert.source)) return ` [${expert.source}]`;
  return '';
}

/** Convert a display name to a kebab-case id */
export function toExpertId(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Throw ExpertFormatError unless the record carries the fields every adapter needs.
 */
export function assertFormattable(expert: Expert): void {
  const result = FormattableExpertSchema.safeParse(expert);
  if (!result.success) {
    throw new ExpertFormatError(expert.id, result.error.issues.map((i) => i.message).join(', '));
  }
}
