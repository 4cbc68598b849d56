/**
 * The review command is rendered from the live council, not shipped as-is.
 */

import type { Expert } from '../expert/types';
import { readTemplate } from './loader';

export const REVIEW_COMMAND = {
  name: 'council',
  description: 'Convene the council to review code',
} as const;

const MEMBERS_PLACEHOLDER = '{{members}}';

export function reviewCommandTemplate(): string {
  return readTemplate('review-command.md');
}

/**
 * Fill the members section of the review template with each expert's name and focus.
 */
export function renderReviewCommand(template: string, experts: Expert[]): string {
  const members = experts.length > 0
    ? experts.map((e) => `### ${e.name}\n**Focus**: ${e.focus}\n`).join('\n')
    : '_No experts in the council yet._\n';
  return template.replace(MEMBERS_PLACEHOLDER, () => members);
}
