/**
 * Filesystem existence checks
 */

import * as fs from 'node:fs';

export function pathExists(p: string): boolean {
  return fs.existsSync(p);
}

export function dirExists(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

export function fileExists(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}
