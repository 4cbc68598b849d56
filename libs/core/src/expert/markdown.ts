/**
 * Persona file format: YAML frontmatter between `---` fences, markdown body after.
 */

import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from 'yaml';
import { ExpertParseError, errorMessage } from '../errors';
import { formatZodIssues } from '../config/loader';
import { ExpertFrontmatterSchema } from './expert.schema';
import type { Expert } from './types';

const REVIEW_STYLE = [
  'When reviewing code, focus on your area of expertise. Be direct and specific.',
  'Explain your reasoning. Suggest concrete improvements.',
];

const CLOSING_FENCE = /\r?\n---[ \t]*(?:\r?\n|$)/;

/**
 * Markdown sections describing how an expert reviews code.
 * Shared by the synthesised body and adapters that re-render personas.
 */
export function personaSections(expert: Expert): string[] {
  const lines: string[] = [];

  const philosophy = expert.philosophy?.trim();
  if (philosophy) {
    lines.push('## Philosophy', '', philosophy, '');
  }

  if (expert.principles && expert.principles.length > 0) {
    lines.push('## Principles', '', ...expert.principles.map((p) => `- ${p}`), '');
  }

  if (expert.redFlags && expert.redFlags.length > 0) {
    lines.push('## Red Flags', '', 'Watch for these patterns:', ...expert.redFlags.map((r) => `- ${r}`), '');
  }

  lines.push('## Review Style', '', ...REVIEW_STYLE);
  return lines;
}

export function personaIntro(expert: Expert): string {
  return `You are channeling ${expert.name}, known for expertise in ${expert.focus}.`;
}

/**
 * Build a body from the structured fields. Deterministic: equal records give equal text.
 */
export function renderExpertBody(expert: Expert): string {
  return [`# ${expert.name} - ${expert.focus}`, '', personaIntro(expert), '', ...personaSections(expert)].join('\n');
}

/**
 * Canonical file content for an expert. Keys are written in a fixed order and
 * empty fields are omitted, so saving twice yields identical bytes.
 */
export function serializeExpert(expert: Expert): string {
  const doc: Record<string, unknown> = {
    id: expert.id,
    name: expert.name,
    focus: expert.focus,
  };
  if (expert.philosophy) doc['philosophy'] = expert.philosophy;
  if (expert.principles && expert.principles.length > 0) doc['principles'] = expert.principles;
  if (expert.redFlags && expert.redFlags.length > 0) doc['red_flags'] = expert.redFlags;
  if (expert.core) doc['core'] = true;
  if (expert.triggers && expert.triggers.length > 0) doc['triggers'] = expert.triggers;
  if (expert.category) doc['category'] = expert.category;
  if (expert.priority) doc['priority'] = expert.priority;

  const body = expert.body?.trim() || renderExpertBody(expert);
  return `---\n${stringifyYaml(doc, { lineWidth: 0 })}---\n\n${body}\n`;
}

/**
 * Point at the offending line of a YAML syntax error.
 */
function describeYamlError(frontmatter: string, err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof YAMLParseError && err.linePos) {
    const lineNum = err.linePos[0].line;
    const lines = frontmatter.split('\n');
    if (lineNum > 0 && lineNum <= lines.length) {
      const start = Math.max(0, lineNum - 2);
      const end = Math.min(lines.length, lineNum + 1);
      const context = [`YAML error at line ${lineNum}:`, ''];
      for (let i = start; i < end; i++) {
        context.push(`  ${i === lineNum - 1 ? '> ' : '  '}${i + 1}: ${lines[i]}`);
      }
      context.push('', `Error: ${message}`);
      return context.join('\n');
    }
  }
  return `failed to parse YAML: ${message}\n\nHint: Check indentation and special characters`;
}

/**
 * Parse persona markdown. The returned record has no provenance; loaders set it.
 */
export function parseExpert(text: string, filePath?: string): Expert {
  if (!text.startsWith('---')) {
    throw new ExpertParseError("missing frontmatter: file must start with '---'", filePath);
  }

  const rest = text.slice(3);
  const close = CLOSING_FENCE.exec(rest);
  if (!close) {
    throw new ExpertParseError("invalid frontmatter: missing closing '---'", filePath);
  }

  const frontmatter = rest.slice(0, close.index).trim();
  const body = rest.slice(close.index + close[0].length).trim();

  let raw: unknown;
  try {
    raw = parseYaml(frontmatter);
  } catch (err) {
    throw new ExpertParseError(describeYamlError(frontmatter, err), filePath);
  }

  const result = ExpertFrontmatterSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ExpertParseError(`invalid frontmatter: ${formatZodIssues(result.error)}`, filePath);
  }

  const fm = result.data;
  const expert: Expert = {
    id: fm.id ?? '',
    name: fm.name ?? '',
    focus: fm.focus ?? '',
    source: '',
  };
  if (fm.philosophy) expert.philosophy = fm.philosophy;
  if (fm.principles && fm.principles.length > 0) expert.principles = fm.principles;
  if (fm.red_flags && fm.red_flags.length > 0) expert.redFlags = fm.red_flags;
  if (fm.core) expert.core = true;
  if (fm.triggers && fm.triggers.length > 0) expert.triggers = fm.triggers;
  if (fm.category) expert.category = fm.category;
  if (fm.priority) expert.priority = fm.priority;
  if (body) expert.body = body;

  return expert;
}
