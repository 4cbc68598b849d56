/**
 * Sync types: run options, plans and reports
 */

export interface SyncOptions {
  /** Compute and return the plan without touching the filesystem */
  dryRun?: boolean;
  /** Delete stale managed files and deprecated paths */
  clean?: boolean;
  /** Overwrite or delete files that are not ours or were edited since the last sync */
  force?: boolean;
}

export type DesiredFileKind = 'agent' | 'command' | 'aggregate';

/** A file that should exist; `path` is relative to the project root, POSIX separators */
export interface DesiredFile {
  path: string;
  content: string;
  kind: DesiredFileKind;
}

export type FileOperation = 'format' | 'read' | 'write' | 'remove' | 'state';

export interface FileError {
  path: string;
  operation: FileOperation;
  message: string;
}

/**
 * Why an existing file is not written:
 * `unmanaged`: never written by a sync. `modified`: edited since the last sync wrote it.
 */
export type SkipReason = 'unmanaged' | 'modified';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
}

/** Everything one reconciliation pass would do for a target */
export interface SyncPlan {
  create: DesiredFile[];
  update: DesiredFile[];
  /** Byte-identical to the desired content */
  unchanged: string[];
  /** Writes and deletions held back; see SkipReason */
  skipped: SkippedFile[];
  /** Managed files no longer desired (deleted only on a clean run) */
  stale: string[];
  delete: string[];
  /** Deprecated paths present on disk */
  deprecated: string[];
  removeDeprecated: string[];
  /** Formatting and read failures found while planning */
  errors: FileError[];
}

export interface TargetResult {
  target: string;
  displayName: string;
  dryRun: boolean;
  plan: SyncPlan;
  created: string[];
  updated: string[];
  deleted: string[];
  unchanged: string[];
  skipped: SkippedFile[];
  removedDeprecated: string[];
  errors: FileError[];
}

export type TargetReport =
  | { status: 'ok'; target: string; displayName: string; result: TargetResult }
  | { status: 'failed'; target: string; displayName: string; error: string; code?: string };

/** How the targets of a run were chosen */
export type ResolutionMode = 'requested' | 'configured' | 'detected' | 'fallback';

export interface SyncReport {
  /** False when any target failed as a whole */
  ok: boolean;
  dryRun: boolean;
  resolvedBy: ResolutionMode;
  targets: TargetReport[];
  /** Expert files that could not be loaded */
  warnings: string[];
}
