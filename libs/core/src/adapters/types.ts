/**
 * Adapter types: per-tool path conventions and content formatters
 */

import type { Expert } from '../expert/types';

/** Directory structure of a tool, relative to the project root */
export interface PathSet {
  /** Directory for agent files (e.g. ".claude/agents"); "." for the project root */
  agentsDir: string;
  /** Directory for command files, or null when the tool has none */
  commandsDir: string | null;
  /** Earlier-generation locations, removed on a clean sync */
  deprecatedPaths: string[];
}

export interface TemplateSet {
  installDoc: string;
  /** Command name -> markdown body */
  commands: Record<string, string>;
}

interface AdapterBase {
  /** Registry key ("claude", "opencode", "generic") */
  readonly name: string;
  readonly displayName: string;
  /** A fallback is never auto-detected; the resolver picks it when nothing else is found */
  readonly fallback: boolean;

  /** Whether the tool's marker exists in the project. Stat calls only. */
  detect(projectRoot: string): boolean;

  paths(): PathSet;
  templates(): TemplateSet;

  /** Throws ExpertFormatError for records missing required fields */
  formatAgent(expert: Expert): string;
  formatCommand(name: string, description: string, body: string): string;
}

/** One agent file per expert plus one file per command */
export interface PerFileAdapter extends AdapterBase {
  readonly layout: 'per-file';
}

/** A single document combining every expert; no command files */
export interface AggregateAdapter extends AdapterBase {
  readonly layout: 'aggregate';
  /** Aggregate document path, relative to the project root */
  readonly aggregateFile: string;
  formatAggregate(experts: Expert[]): string;
}

export type Adapter = PerFileAdapter | AggregateAdapter;
