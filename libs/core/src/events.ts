/**
 * Sync lifecycle events
 */

import type { ResolutionMode, TargetResult } from './sync/types';

export type SyncEvent =
  | { type: 'sync:started'; operationId: string; targets: string[]; resolvedBy: ResolutionMode; dryRun: boolean }
  | { type: 'target:started'; operationId: string; target: string; displayName: string }
  | { type: 'target:completed'; operationId: string; target: string; result: TargetResult }
  | { type: 'target:failed'; operationId: string; target: string; error: string }
  /** Deprecated paths exist; `removed` lists those a clean run deleted */
  | { type: 'deprecated:found'; operationId: string; target: string; paths: string[]; removed: string[] }
  | { type: 'sync:completed'; operationId: string; ok: boolean };

export type SyncEventHandler = (event: SyncEvent) => void;
