/**
 * Council config schemas: Zod validation schemas and derived types
 */

import { z } from 'zod';

export const CouncilConfigSchema = z.object({
  version: z.number().int().positive().default(1),
  /** Primary tool; used as the single target when `targets` is empty */
  tool: z.string().min(1).optional(),
  /** Explicit, ordered sync targets */
  targets: z.array(z.string().min(1)).optional(),
  /** Bundled commands to generate; all of them when unset */
  commands: z.array(z.string().min(1)).optional(),
});

export type CouncilConfig = z.output<typeof CouncilConfigSchema>;
export type CouncilConfigInput = z.input<typeof CouncilConfigSchema>;
