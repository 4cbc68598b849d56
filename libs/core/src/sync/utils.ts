/**
 * Sync utilities
 */

import * as crypto from 'node:crypto';
import * as path from 'node:path';

export function hashContent(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/** Join project-relative path segments with POSIX separators; "." segments vanish */
export function relativeJoin(...parts: string[]): string {
  return path.posix.join(...parts);
}

/** Absolute filesystem path for a project-relative path */
export function absolutePath(projectRoot: string, relativePath: string): string {
  return path.join(projectRoot, ...relativePath.split('/'));
}

/** Code-unit order on `path`, independent of locale */
export function byPath(a: { path: string }, b: { path: string }): number {
  if (a.path < b.path) return -1;
  return a.path > b.path ? 1 : 0;
}
