/**
 * Bundled markdown templates (install docs, command bodies, review command).
 *
 * Templates live beside this module in the source tree. A compiled copy of
 * the module looks them up there too.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

const MARKER_FILE = 'review-command.md';

const cache = new Map<string, string>();
let templatesDir: string | null = null;

export function getTemplatesDir(): string {
  if (templatesDir) return templatesDir;

  const candidates = [
    // Source tree (tests, ts loaders)
    __dirname,
    // Compiled: libs/core/dist/templates -> libs/core/src/templates
    path.join(__dirname, '..', '..', 'src', 'templates'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(path.join(candidate, MARKER_FILE))) {
      templatesDir = candidate;
      return candidate;
    }
  }

  throw new Error(`Bundled templates not found (looked in ${candidates.join(', ')})`);
}

/** Read a template by path relative to the templates directory */
export function readTemplate(relativePath: string): string {
  const cached = cache.get(relativePath);
  if (cached !== undefined) return cached;

  const content = fs.readFileSync(path.join(getTemplatesDir(), relativePath), 'utf-8');
  cache.set(relativePath, content);
  return content;
}

/**
 * Command bodies bundled for a tool, keyed by command name (file stem).
 */
export function readCommandTemplates(tool: string): Record<string, string> {
  const dir = path.join(getTemplatesDir(), tool, 'commands');
  if (!fs.existsSync(dir)) return {};

  const commands: Record<string, string> = {};
  for (const file of fs.readdirSync(dir).filter((f) => f.endsWith('.md')).sort()) {
    commands[path.basename(file, '.md')] = readTemplate(path.join(tool, 'commands', file));
  }
  return commands;
}
