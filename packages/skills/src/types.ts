/**
 * Skill manifest types
 *
 * A skill is documentation for the agent runtime: a SKILL.md file with YAML
 * frontmatter and markdown instructions. Nothing in a skill is executed here.
 */

import { z } from '@nanobot-launcher/core';

export const skillFrontmatterSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lower-case letters, digits and dashes'),
  description: z.string().min(1),
  /** Tools the instructions refer to */
  tools: z.array(z.string().min(1)).default([]),
  requires: z
    .object({
      env: z.array(z.string().min(1)).default([]),
      bins: z.array(z.string().min(1)).default([]),
    })
    .default({}),
});

export type SkillFrontmatter = z.infer<typeof skillFrontmatterSchema>;

export interface SkillManifest extends SkillFrontmatter {
  /** Markdown body */
  instructions: string;
  /** File the manifest was read from */
  location: string;
}

export interface SkillSummary {
  name: string;
  description: string;
  tools: string[];
  location: string;
}
