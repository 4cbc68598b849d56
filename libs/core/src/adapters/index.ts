import { AdapterRegistry } from './registry';
import { ClaudeAdapter } from './claude.adapter';
import { GenericAdapter } from './generic.adapter';
import { OpenCodeAdapter } from './opencode.adapter';

export { AdapterRegistry } from './registry';
export { ClaudeAdapter } from './claude.adapter';
export { OpenCodeAdapter } from './opencode.adapter';
export { GenericAdapter } from './generic.adapter';
export type { Adapter, PerFileAdapter, AggregateAdapter, PathSet, TemplateSet } from './types';

/** Registry with every built-in adapter */
export function createDefaultRegistry(): AdapterRegistry {
  return new AdapterRegistry([new ClaudeAdapter(), new OpenCodeAdapter(), new GenericAdapter()]);
}
