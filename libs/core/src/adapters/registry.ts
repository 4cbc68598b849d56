/**
 * Adapter registry: maps tool names to adapters with deterministic enumeration.
 *
 * Built once at startup and handed to the resolver and sync service; tests
 * construct their own with mock adapters.
 */

import type { Adapter } from './types';

export class AdapterRegistry {
  private readonly adapters = new Map<string, Adapter>();

  constructor(adapters: Adapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  /** Insert by name; a later registration for the same name replaces the earlier one */
  register(adapter: Adapter): void {
    this.adapters.set(adapter.name, adapter);
  }

  get(name: string): Adapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  /** Registered names, sorted */
  names(): string[] {
    return Array.from(this.adapters.keys()).sort();
  }

  /** Registered adapters in name order */
  all(): Adapter[] {
    return this.names().map((name) => this.mustGet(name));
  }

  /**
   * Adapters whose tool is present in the project, in name order.
   * Fallback adapters are excluded.
   */
  detect(projectRoot: string): Adapter[] {
    return this.all().filter((a) => !a.fallback && a.detect(projectRoot));
  }

  /** The first fallback adapter by name, if any */
  fallback(): Adapter | undefined {
    return this.all().find((a) => a.fallback);
  }

  private mustGet(name: string): Adapter {
    const adapter = this.adapters.get(name);
    if (!adapter) throw new Error(`Adapter "${name}" is not registered`);
    return adapter;
  }
}
