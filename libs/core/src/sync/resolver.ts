/**
 * Target resolution: which adapters a sync runs
 */

import type { AdapterRegistry } from '../adapters/registry';
import type { Adapter } from '../adapters/types';
import type { CouncilConfig } from '../config/config.schema';
import { NoTargetsError, UnknownTargetError } from '../errors';
import type { ResolutionMode } from './types';

export interface TargetResolution {
  adapters: Adapter[];
  mode: Exclude<ResolutionMode, 'requested'>;
}

/**
 * Resolve the sync targets for a project.
 *
 * Configured `targets` win, then the single configured `tool`. Otherwise the
 * registry detects tools in the project: none selects the fallback adapter,
 * one or more select every detected adapter in name order.
 *
 * Throws UnknownTargetError for a configured name the registry lacks, and
 * NoTargetsError when nothing is detected and no fallback is registered.
 */
export function resolveTargets(
  registry: AdapterRegistry,
  config: Pick<CouncilConfig, 'targets' | 'tool'>,
  projectRoot: string,
): TargetResolution {
  const configured = config.targets && config.targets.length > 0
    ? config.targets
    : config.tool
      ? [config.tool]
      : [];

  if (configured.length > 0) {
    const adapters: Adapter[] = [];
    const seen = new Set<string>();
    for (const name of configured) {
      if (seen.has(name)) continue;
      seen.add(name);
      const adapter = registry.get(name);
      if (!adapter) throw new UnknownTargetError(name, registry.names());
      adapters.push(adapter);
    }
    return { adapters, mode: 'configured' };
  }

  const detected = registry.detect(projectRoot);
  if (detected.length > 0) {
    return { adapters: detected, mode: 'detected' };
  }

  const fallback = registry.fallback();
  if (!fallback) throw new NoTargetsError();
  return { adapters: [fallback], mode: 'fallback' };
}
