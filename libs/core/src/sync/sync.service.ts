/**
 * Sync Service
 *
 * Distributes the council's experts to every resolved target. Configuration
 * problems (no council root, unknown target) throw before anything is touched;
 * a failure inside one target is recorded in the report and the remaining
 * targets still run.
 */

import * as crypto from 'node:crypto';
import type { AdapterRegistry } from '../adapters/registry';
import type { Adapter } from '../adapters/types';
import type { CouncilConfig } from '../config/config.schema';
import { councilExists, councilPath } from '../config/paths';
import { CouncilError, CouncilNotInitializedError, UnknownTargetError, errorMessage } from '../errors';
import type { SyncEvent, SyncEventHandler } from '../events';
import type { ExpertProvider } from '../expert/types';
import { noopLogger, type Logger } from '../logger';
import { Reconciler } from './reconciler';
import { resolveTargets } from './resolver';
import { SyncStateStore } from './state';
import type { ResolutionMode, SyncOptions, SyncReport, TargetReport } from './types';

export interface SyncServiceOptions {
  projectRoot: string;
  registry: AdapterRegistry;
  experts: ExpertProvider;
  logger?: Logger;
  onEvent?: SyncEventHandler;
}

export class SyncService {
  private readonly projectRoot: string;
  private readonly registry: AdapterRegistry;
  private readonly experts: ExpertProvider;
  private readonly logger: Logger;
  private readonly onEvent?: SyncEventHandler;

  constructor(options: SyncServiceOptions) {
    this.projectRoot = options.projectRoot;
    this.registry = options.registry;
    this.experts = options.experts;
    this.logger = options.logger ?? noopLogger;
    this.onEvent = options.onEvent;
  }

  private emit(event: SyncEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (err) {
      this.logger.warn(`[sync] event handler failed on ${event.type}: ${errorMessage(err)}`);
    }
  }

  /** Sync every target the configuration or the project resolves to */
  syncAll(config: CouncilConfig, options: SyncOptions = {}): SyncReport {
    this.assertInitialized();
    const { adapters, mode } = resolveTargets(this.registry, config, this.projectRoot);
    this.logger.debug(`[sync] targets (${mode}): ${adapters.map((a) => a.name).join(', ')}`);
    return this.run(adapters, mode, config, options);
  }

  /** Sync a single named target, ignoring configured and detected targets */
  syncTarget(name: string, config: CouncilConfig, options: SyncOptions = {}): SyncReport {
    this.assertInitialized();
    const adapter = this.registry.get(name);
    if (!adapter) {
      throw new UnknownTargetError(name, this.registry.names());
    }
    return this.run([adapter], 'requested', config, options);
  }

  /**
   * Every location any registered target may have generated, for uninstall:
   * agent and command directories (never the project root itself), deprecated
   * paths and aggregate documents. Adapters in name order, no duplicates.
   */
  allCleanPaths(): string[] {
    const paths: string[] = [];
    const add = (p: string | null) => {
      if (p !== null && p !== '.' && !paths.includes(p)) paths.push(p);
    };

    for (const adapter of this.registry.all()) {
      const { agentsDir, commandsDir, deprecatedPaths } = adapter.paths();
      add(agentsDir);
      add(commandsDir);
      deprecatedPaths.forEach(add);
      if (adapter.layout === 'aggregate') add(adapter.aggregateFile);
    }
    return paths;
  }

  // ─── Internals ──────────────────────────────────────────────

  private assertInitialized(): void {
    if (!councilExists(this.projectRoot)) {
      throw new CouncilNotInitializedError(councilPath(this.projectRoot));
    }
  }

  private run(adapters: Adapter[], resolvedBy: ResolutionMode, config: CouncilConfig, options: SyncOptions): SyncReport {
    const operationId = crypto.randomUUID();
    const dryRun = options.dryRun === true;
    const { experts, warnings } = this.experts.listExperts();
    for (const warning of warnings) {
      this.logger.warn(`[sync] ${warning}`);
    }

    const reconciler = new Reconciler({
      projectRoot: this.projectRoot,
      state: new SyncStateStore(this.projectRoot, this.logger),
      commands: config.commands,
      logger: this.logger,
    });

    this.emit({ type: 'sync:started', operationId, targets: adapters.map((a) => a.name), resolvedBy, dryRun });

    const targets: TargetReport[] = [];
    for (const adapter of adapters) {
      this.emit({ type: 'target:started', operationId, target: adapter.name, displayName: adapter.displayName });

      try {
        const result = reconciler.reconcile(adapter, experts, options);

        if (result.plan.deprecated.length > 0) {
          this.emit({
            type: 'deprecated:found',
            operationId,
            target: adapter.name,
            paths: result.plan.deprecated,
            removed: result.removedDeprecated,
          });
        }

        targets.push({ status: 'ok', target: adapter.name, displayName: adapter.displayName, result });
        this.emit({ type: 'target:completed', operationId, target: adapter.name, result });
      } catch (err) {
        const error = errorMessage(err);
        this.logger.error(`[sync] target ${adapter.name} failed: ${error}`);
        targets.push({
          status: 'failed',
          target: adapter.name,
          displayName: adapter.displayName,
          error,
          ...(err instanceof CouncilError ? { code: err.code } : {}),
        });
        this.emit({ type: 'target:failed', operationId, target: adapter.name, error });
      }
    }

    const ok = targets.every((t) => t.status === 'ok');
    this.emit({ type: 'sync:completed', operationId, ok });

    return { ok, dryRun, resolvedBy, targets, warnings };
  }
}
