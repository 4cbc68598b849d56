/**
 * Expert persona types
 */

export type ExpertPriority = 'normal' | 'high' | 'always';

/**
 * Where an expert record was loaded from:
 * `''` project council, `'custom'` personal council, `'installed:<repo>'` installed repository.
 * Derived at load time, never persisted.
 */
export type Provenance = '' | 'custom' | `installed:${string}`;

export interface Expert {
  id: string;
  name: string;
  focus: string;
  philosophy?: string;
  principles?: string[];
  redFlags?: string[];
  category?: string;
  priority?: ExpertPriority;
  /** Suggestion metadata, preserved on save */
  core?: boolean;
  triggers?: string[];
  /** Markdown after the frontmatter; synthesised from the fields when empty */
  body?: string;
  source?: Provenance;
}

export interface ExpertListResult {
  experts: Expert[];
  warnings: string[];
}

/**
 * Supplies the current council membership for one sync pass.
 */
export interface ExpertProvider {
  listExperts(): ExpertListResult;
}
