/**
 * Shared fixtures for core specs
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Expert, ExpertProvider } from '../expert/types';
import type { Logger } from '../logger';

export function makeTempDir(prefix = 'council-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeExpert(overrides: Partial<Expert> = {}): Expert {
  return {
    id: 'dhh',
    name: 'David Heinemeier Hansson',
    focus: 'Rails and simplicity',
    source: '',
    ...overrides,
  };
}

/** Create `.council/` with an optional config.yaml body */
export function initCouncil(projectRoot: string, configYaml = 'version: 1\n'): void {
  fs.mkdirSync(path.join(projectRoot, '.council', 'experts'), { recursive: true });
  fs.writeFileSync(path.join(projectRoot, '.council', 'config.yaml'), configYaml);
}

export function writeProjectFile(projectRoot: string, relPath: string, content: string): void {
  const abs = path.join(projectRoot, relPath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
}

export function readProjectFile(projectRoot: string, relPath: string): string {
  return fs.readFileSync(path.join(projectRoot, relPath), 'utf-8');
}

export function projectPathExists(projectRoot: string, relPath: string): boolean {
  return fs.existsSync(path.join(projectRoot, relPath));
}

/** Every file under a directory as sorted POSIX relative paths */
export function listFiles(dir: string, base = ''): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(path.join(dir, base), { withFileTypes: true })) {
    const rel = base ? `${base}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...listFiles(dir, rel));
    } else {
      files.push(rel);
    }
  }
  return files.sort();
}

/** Path -> content for every file under a directory */
export function snapshotTree(dir: string): Record<string, string> {
  const tree: Record<string, string> = {};
  for (const rel of listFiles(dir)) {
    tree[rel] = fs.readFileSync(path.join(dir, rel), 'utf-8');
  }
  return tree;
}

export function staticProvider(experts: Expert[], warnings: string[] = []): ExpertProvider {
  return {
    listExperts: () => ({ experts: experts.map((e) => ({ ...e })), warnings: [...warnings] }),
  };
}

export function createMockLogger(): Logger & { warn: jest.Mock; error: jest.Mock; debug: jest.Mock; info: jest.Mock } {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
