/**
 * Council path utilities
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** Project council root, relative to the project directory */
export const COUNCIL_DIR = '.council';
export const CONFIG_FILE = 'config.yaml';
export const EXPERTS_DIR = 'experts';
/** Record of the files each target's last sync wrote */
export const SYNC_STATE_FILE = 'sync-state.json';

export const INSTALLED_DIR = 'installed';
export const MY_COUNCIL_DIR = 'my-council';

/**
 * Resolve a path inside the project's council directory.
 */
export function councilPath(projectRoot: string, ...parts: string[]): string {
  return path.join(projectRoot, COUNCIL_DIR, ...parts);
}

/**
 * Whether the project has a council directory.
 */
export function councilExists(projectRoot: string): boolean {
  try {
    return fs.statSync(councilPath(projectRoot)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Get the per-user council directory (personal council, installed repositories).
 * Respects COUNCIL_HOME for test isolation.
 */
export function getUserCouncilDir(): string {
  const override = process.env['COUNCIL_HOME'];
  if (override) return path.resolve(override);

  const home = os.homedir();
  switch (process.platform) {
    case 'darwin':
      return path.join(home, 'Library', 'Application Support', 'council');
    case 'win32':
      return path.join(process.env['APPDATA'] ?? path.join(home, 'AppData', 'Roaming'), 'council');
    default:
      return path.join(process.env['XDG_CONFIG_HOME'] ?? path.join(home, '.config'), 'council');
  }
}

export function getInstalledDir(userDir: string = getUserCouncilDir()): string {
  return path.join(userDir, INSTALLED_DIR);
}

export function getMyCouncilDir(userDir: string = getUserCouncilDir()): string {
  return path.join(userDir, MY_COUNCIL_DIR);
}
