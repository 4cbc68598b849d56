/**
 * Expert schemas: frontmatter validation and the fields a formatter requires
 */

import { z } from 'zod';

export const ExpertPrioritySchema = z.enum(['normal', 'high', 'always']);

/** YAML frontmatter of a persona file. Empty YAML values parse as null. */
export const ExpertFrontmatterSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  focus: z.string().nullish(),
  philosophy: z.string().nullish(),
  principles: z.array(z.string()).nullish(),
  red_flags: z.array(z.string()).nullish(),
  core: z.boolean().nullish(),
  triggers: z.array(z.string()).nullish(),
  category: z.string().nullish(),
  priority: ExpertPrioritySchema.nullish(),
});
export type ExpertFrontmatter = z.output<typeof ExpertFrontmatterSchema>;

/** A safe filename stem: no separators, no leading dot */
export const EXPERT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Fields an adapter needs before it can format an expert */
export const FormattableExpertSchema = z.object({
  id: z.string().regex(EXPERT_ID_PATTERN, 'id must be a filename-safe slug'),
  name: z.string().trim().min(1, 'name is required'),
  focus: z.string().trim().min(1, 'focus is required'),
});
