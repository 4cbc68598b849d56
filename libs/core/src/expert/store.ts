/**
 * Expert persistence: loading persona directories and saving single files
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ExpertIntegrityError, errorMessage, hasErrorCode } from '../errors';
import { EXPERTS_DIR, councilPath, getInstalledDir, getMyCouncilDir, getUserCouncilDir } from '../config/paths';
import { parseExpert, serializeExpert } from './markdown';
import type { Expert, ExpertListResult, ExpertProvider, Provenance } from './types';

/**
 * Read one persona file and tag it with its provenance.
 */
export function loadExpertFile(filePath: string, source: Provenance = ''): Expert {
  const expert = parseExpert(fs.readFileSync(filePath, 'utf-8'), filePath);
  expert.source = source;
  return expert;
}

/**
 * Load every persona in a directory, in filename order.
 * Subdirectories, non-markdown files and README.md are ignored; files that
 * fail to parse are reported as warnings. A missing directory is empty.
 */
export function listExpertsInDir(dir: string, source: Provenance = ''): ExpertListResult {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) return { experts: [], warnings: [] };
    throw err;
  }

  const result: ExpertListResult = { experts: [], warnings: [] };
  const files = entries
    .filter((e) => e.isFile() && e.name.endsWith('.md') && e.name !== 'README.md')
    .map((e) => e.name)
    .sort();

  for (const name of files) {
    try {
      result.experts.push(loadExpertFile(path.join(dir, name), source));
    } catch (err) {
      result.warnings.push(`could not load ${name}: ${errorMessage(err)}`);
    }
  }

  return result;
}

/**
 * Write an expert and verify the file parses back to the same identity.
 * A file that fails verification is removed.
 */
export function saveExpert(expert: Expert, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, serializeExpert(expert), 'utf-8');

  let loaded: Expert;
  try {
    loaded = loadExpertFile(filePath);
  } catch (err) {
    fs.rmSync(filePath, { force: true });
    throw new ExpertIntegrityError(filePath, errorMessage(err));
  }

  if (loaded.id !== expert.id || loaded.name !== expert.name) {
    fs.rmSync(filePath, { force: true });
    throw new ExpertIntegrityError(filePath, 'id or name mismatch after save');
  }
}

export interface CouncilExpertProviderOptions {
  projectRoot: string;
  /** Per-user council directory; defaults to getUserCouncilDir() */
  userDir?: string;
}

/**
 * Merges installed repositories, the personal council and the project council
 * into the membership one sync pass distributes.
 */
export class CouncilExpertProvider implements ExpertProvider {
  private readonly projectRoot: string;
  private readonly userDir: string;

  constructor(options: CouncilExpertProviderOptions) {
    this.projectRoot = options.projectRoot;
    this.userDir = options.userDir ?? getUserCouncilDir();
  }

  listExperts(): ExpertListResult {
    const combined: ExpertListResult = { experts: [], warnings: [] };
    const append = (r: ExpertListResult) => {
      combined.experts.push(...r.experts);
      combined.warnings.push(...r.warnings);
    };

    // Installed repositories are optional
    try {
      for (const repo of this.listInstalledRepos()) {
        append(listExpertsInDir(path.join(getInstalledDir(this.userDir), repo), `installed:${repo}`));
      }
    } catch (err) {
      combined.warnings.push(`could not load installed experts: ${errorMessage(err)}`);
    }

    try {
      append(listExpertsInDir(getMyCouncilDir(this.userDir), 'custom'));
    } catch (err) {
      combined.warnings.push(`could not load personal council: ${errorMessage(err)}`);
    }

    append(listExpertsInDir(councilPath(this.projectRoot, EXPERTS_DIR), ''));
    return combined;
  }

  private listInstalledRepos(): string[] {
    const dir = getInstalledDir(this.userDir);
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isDirectory())
      .map((e) => e.name)
      .sort();
  }
}
