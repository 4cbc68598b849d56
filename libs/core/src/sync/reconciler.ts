/**
 * Reconciler: brings one target's files in line with the expert set.
 *
 * Planning reads the filesystem and the sync state; applying writes, deletes
 * and records. Only files recorded in the sync state belong to the target:
 * anything else is reported as skipped instead of being overwritten or removed,
 * unless the run is forced.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { TargetDirectoryError, errorMessage, hasErrorCode } from '../errors';
import type { Expert } from '../expert/types';
import { noopLogger, type Logger } from '../logger';
import type { Adapter } from '../adapters/types';
import { pathExists, fileExists } from '../utils/fs';
import { computeDesiredFiles } from './desired';
import { SYNC_STATE_PATH, type SyncStateStore, type TargetFiles } from './state';
import type { DesiredFile, FileError, SkipReason, SyncOptions, SyncPlan, TargetResult } from './types';
import { absolutePath, hashContent, relativeJoin } from './utils';

export interface ReconcilerOptions {
  projectRoot: string;
  state: SyncStateStore;
  /** Command names to generate; every command when undefined */
  commands?: string[];
  logger?: Logger;
}

interface PlannedTarget {
  plan: SyncPlan;
  desired: Map<string, DesiredFile>;
  recorded: TargetFiles;
}

export class Reconciler {
  private readonly projectRoot: string;
  private readonly state: SyncStateStore;
  private readonly commands?: string[];
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.projectRoot = options.projectRoot;
    this.state = options.state;
    this.commands = options.commands;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Plan and, unless `dryRun`, apply the changes for one target.
   *
   * Per-file failures are collected in the result. Throws TargetDirectoryError
   * when the target's directories cannot be created; a dry run throws it too
   * when an existing non-directory stands in the way.
   */
  reconcile(adapter: Adapter, experts: Expert[], options: SyncOptions = {}): TargetResult {
    const planned = this.plan(adapter, experts, options);
    const { plan } = planned;

    const result: TargetResult = {
      target: adapter.name,
      displayName: adapter.displayName,
      dryRun: options.dryRun === true,
      plan,
      created: [],
      updated: [],
      deleted: [],
      unchanged: [...plan.unchanged],
      skipped: [...plan.skipped],
      removedDeprecated: [],
      errors: [...plan.errors],
    };

    const dirs = targetDirectories(adapter, plan);
    if (options.dryRun) {
      this.checkDirectories(adapter.name, dirs);
      this.logger.debug(`[reconcile] ${adapter.name}: dry run, nothing written`);
      return result;
    }

    this.ensureDirectories(adapter.name, dirs);
    this.apply(adapter, planned, result);
    return result;
  }

  // ─── Planning ───────────────────────────────────────────────

  private plan(adapter: Adapter, experts: Expert[], options: SyncOptions): PlannedTarget {
    const desiredSet = computeDesiredFiles(adapter, experts, this.commands);
    const desired = new Map(desiredSet.files.map((f) => [f.path, f]));
    const recorded = this.state.getTargetFiles(adapter.name);

    const plan: SyncPlan = {
      create: [],
      update: [],
      unchanged: [],
      skipped: [],
      stale: [],
      delete: [],
      deprecated: [],
      removeDeprecated: [],
      errors: [...desiredSet.errors],
    };

    for (const file of desiredSet.files) {
      const current = this.readCurrent(file.path, plan.errors);
      if (current === undefined) continue;

      if (current === null) {
        plan.create.push(file);
      } else if (current === file.content) {
        plan.unchanged.push(file.path);
      } else {
        const reason = driftReason(recorded[file.path], current);
        if (reason && !options.force) {
          plan.skipped.push({ path: file.path, reason });
        } else {
          plan.update.push(file);
        }
      }
    }

    for (const owned of this.listOwned(adapter, recorded, plan.errors)) {
      if (desired.has(owned)) continue;
      plan.stale.push(owned);
      if (!options.clean) continue;

      const current = this.readCurrent(owned, plan.errors);
      if (current === undefined || current === null) continue;

      const reason = driftReason(recorded[owned], current);
      if (reason && !options.force) {
        plan.skipped.push({ path: owned, reason });
      } else {
        plan.delete.push(owned);
      }
    }

    for (const deprecated of adapter.paths().deprecatedPaths) {
      if (pathExists(absolutePath(this.projectRoot, deprecated))) {
        plan.deprecated.push(deprecated);
      }
    }
    if (options.clean) {
      plan.removeDeprecated.push(...plan.deprecated);
    }

    return { plan, desired, recorded };
  }

  /**
   * Managed files of a target that exist on disk, sorted.
   * A per-file target owns the recorded `.md` files in its directories; an
   * aggregate target owns its document once recorded.
   */
  private listOwned(adapter: Adapter, recorded: TargetFiles, errors: FileError[]): string[] {
    if (adapter.layout === 'aggregate') {
      const file = adapter.aggregateFile;
      return file in recorded && fileExists(absolutePath(this.projectRoot, file)) ? [file] : [];
    }

    const { agentsDir, commandsDir } = adapter.paths();
    const dirs = [agentsDir, commandsDir].filter((d): d is string => d !== null && d !== '.');
    const owned = new Set<string>();

    for (const dir of dirs) {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(absolutePath(this.projectRoot, dir), { withFileTypes: true });
      } catch (err) {
        if (!hasErrorCode(err, 'ENOENT')) {
          errors.push({ path: dir, operation: 'read', message: errorMessage(err) });
        }
        continue;
      }

      for (const entry of entries) {
        if (!entry.isFile() || !entry.name.endsWith('.md')) continue;
        const rel = relativeJoin(dir, entry.name);
        if (rel in recorded) owned.add(rel);
      }
    }

    return Array.from(owned).sort();
  }

  /**
   * Current content of a project file: null when absent, undefined when it
   * could not be read (the failure is recorded).
   */
  private readCurrent(relPath: string, errors: FileError[]): string | null | undefined {
    try {
      return fs.readFileSync(absolutePath(this.projectRoot, relPath), 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return null;
      errors.push({ path: relPath, operation: 'read', message: errorMessage(err) });
      return undefined;
    }
  }

  // ─── Applying ───────────────────────────────────────────────

  private ensureDirectories(target: string, dirs: string[]): void {
    for (const dir of dirs) {
      try {
        fs.mkdirSync(absolutePath(this.projectRoot, dir), { recursive: true });
      } catch (err) {
        throw new TargetDirectoryError(target, dir, err);
      }
    }
  }

  /** Without creating anything, fail as ensureDirectories would on a file in the way */
  private checkDirectories(target: string, dirs: string[]): void {
    for (const dir of dirs) {
      let current = '';
      for (const segment of dir.split('/')) {
        current = current ? `${current}/${segment}` : segment;
        let stat: fs.Stats;
        try {
          stat = fs.statSync(absolutePath(this.projectRoot, current));
        } catch (err) {
          if (hasErrorCode(err, 'ENOENT')) break;
          throw new TargetDirectoryError(target, dir, err);
        }
        if (!stat.isDirectory()) {
          throw new TargetDirectoryError(target, dir, `${current} is not a directory`);
        }
      }
    }
  }

  private apply(adapter: Adapter, planned: PlannedTarget, result: TargetResult): void {
    const { plan, desired, recorded } = planned;
    const next: TargetFiles = { ...recorded };

    for (const relPath of plan.unchanged) {
      const file = desired.get(relPath);
      if (file) next[relPath] = hashContent(file.content);
    }

    const write = (file: DesiredFile, done: string[]) => {
      try {
        fs.writeFileSync(absolutePath(this.projectRoot, file.path), file.content, 'utf-8');
        next[file.path] = hashContent(file.content);
        done.push(file.path);
        this.logger.debug(`[reconcile] ${adapter.name}: wrote ${file.path}`);
      } catch (err) {
        result.errors.push({ path: file.path, operation: 'write', message: errorMessage(err) });
      }
    };
    for (const file of plan.create) write(file, result.created);
    for (const file of plan.update) write(file, result.updated);

    for (const relPath of plan.delete) {
      try {
        fs.rmSync(absolutePath(this.projectRoot, relPath));
        delete next[relPath];
        result.deleted.push(relPath);
        this.logger.debug(`[reconcile] ${adapter.name}: removed ${relPath}`);
      } catch (err) {
        result.errors.push({ path: relPath, operation: 'remove', message: errorMessage(err) });
      }
    }

    for (const relPath of plan.removeDeprecated) {
      try {
        fs.rmSync(absolutePath(this.projectRoot, relPath), { recursive: true, force: true });
        result.removedDeprecated.push(relPath);
        this.logger.debug(`[reconcile] ${adapter.name}: removed deprecated ${relPath}`);
      } catch (err) {
        result.errors.push({ path: relPath, operation: 'remove', message: errorMessage(err) });
      }
    }

    // Forget files that are gone, whoever removed them
    for (const relPath of Object.keys(next)) {
      if (!fileExists(absolutePath(this.projectRoot, relPath))) {
        delete next[relPath];
      }
    }

    try {
      this.state.setTargetFiles(adapter.name, next);
    } catch (err) {
      result.errors.push({ path: SYNC_STATE_PATH, operation: 'state', message: errorMessage(err) });
    }
  }
}

/** Directories a target writes into, sorted */
function targetDirectories(adapter: Adapter, plan: SyncPlan): string[] {
  const dirs = new Set<string>();
  if (adapter.layout === 'per-file') {
    const { agentsDir, commandsDir } = adapter.paths();
    for (const dir of [agentsDir, commandsDir]) {
      if (dir !== null && dir !== '.') dirs.add(dir);
    }
  }
  for (const file of [...plan.create, ...plan.update]) {
    const dir = path.posix.dirname(file.path);
    if (dir !== '.') dirs.add(dir);
  }
  return Array.from(dirs).sort();
}

/** Why a byte-different file must not be replaced, or null when it is ours and untouched */
function driftReason(recordedHash: string | undefined, content: string): SkipReason | null {
  if (recordedHash === undefined) return 'unmanaged';
  return hashContent(content) === recordedHash ? null : 'modified';
}
