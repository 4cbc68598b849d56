/**
 * Sync module: desired state, reconciler, target resolution and the sync service
 */

export type {
  SyncOptions,
  SyncPlan,
  DesiredFile,
  DesiredFileKind,
  FileError,
  FileOperation,
  SkipReason,
  SkippedFile,
  TargetResult,
  TargetReport,
  SyncReport,
  ResolutionMode,
} from './types';

export { SyncService } from './sync.service';
export type { SyncServiceOptions } from './sync.service';

export { Reconciler } from './reconciler';
export type { ReconcilerOptions } from './reconciler';

export { resolveTargets } from './resolver';
export type { TargetResolution } from './resolver';

export { computeDesiredFiles, commandDescription } from './desired';
export type { DesiredSet } from './desired';

export { SyncStateStore, SYNC_STATE_PATH, SYNC_STATE_VERSION } from './state';
export type { SyncState, TargetFiles } from './state';

export { hashContent } from './utils';
