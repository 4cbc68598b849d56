/**
 * Sync state: which files each target's last sync wrote, and their hashes.
 *
 * Stored at `.council/sync-state.json`. A file is owned by a target only while
 * it is recorded here; the reconciler never deletes or overwrites anything else
 * without `force`.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { COUNCIL_DIR, SYNC_STATE_FILE, councilPath } from '../config/paths';
import { errorMessage, hasErrorCode } from '../errors';
import { noopLogger, type Logger } from '../logger';

export const SYNC_STATE_VERSION = 1;

/** Project-relative path -> sha256 of the content last written */
const TargetFilesSchema = z.record(z.string(), z.string().regex(/^[0-9a-f]{64}$/));

const SyncStateSchema = z.object({
  version: z.literal(SYNC_STATE_VERSION),
  targets: z.record(z.string(), TargetFilesSchema),
});

export type TargetFiles = z.infer<typeof TargetFilesSchema>;
export type SyncState = z.infer<typeof SyncStateSchema>;

/** Project-relative location of the state file */
export const SYNC_STATE_PATH = `${COUNCIL_DIR}/${SYNC_STATE_FILE}`;

function emptyState(): SyncState {
  return { version: SYNC_STATE_VERSION, targets: {} };
}

function sortedRecord(record: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(record).sort()) {
    out[key] = record[key];
  }
  return out;
}

export class SyncStateStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private state: SyncState | null = null;

  constructor(projectRoot: string, logger: Logger = noopLogger) {
    this.filePath = councilPath(projectRoot, SYNC_STATE_FILE);
    this.logger = logger;
  }

  /** Recorded files for a target; empty when the target was never synced */
  getTargetFiles(target: string): TargetFiles {
    return { ...(this.load().targets[target] ?? {}) };
  }

  /**
   * Replace a target's recorded files and write the state file.
   * Writes nothing when the entry is unchanged.
   */
  setTargetFiles(target: string, files: TargetFiles): void {
    const state = this.load();
    const next = sortedRecord(files);
    const current = state.targets[target];
    if (current && JSON.stringify(sortedRecord(current)) === JSON.stringify(next)) {
      return;
    }
    if (!current && Object.keys(next).length === 0) {
      return;
    }

    const targets = { ...state.targets };
    if (Object.keys(next).length === 0) {
      delete targets[target];
    } else {
      targets[target] = next;
    }

    const updated: SyncState = { version: SYNC_STATE_VERSION, targets: {} };
    for (const name of Object.keys(targets).sort()) {
      updated.targets[name] = targets[name];
    }

    fs.writeFileSync(this.filePath, `${JSON.stringify(updated, null, 2)}\n`, 'utf-8');
    this.state = updated;
  }

  private load(): SyncState {
    if (this.state) return this.state;

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (!hasErrorCode(err, 'ENOENT')) {
        this.logger.warn(`[sync-state] cannot read ${this.filePath}: ${errorMessage(err)}`);
      }
      this.state = emptyState();
      return this.state;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`[sync-state] ignoring unparsable ${this.filePath}: ${errorMessage(err)}`);
      this.state = emptyState();
      return this.state;
    }

    const result = SyncStateSchema.safeParse(json);
    if (!result.success) {
      this.logger.warn(`[sync-state] ignoring invalid ${this.filePath}`);
      this.state = emptyState();
      return this.state;
    }

    this.state = result.data;
    return this.state;
  }
}
