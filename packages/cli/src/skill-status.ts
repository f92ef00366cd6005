/**
 * Skill inspection behind `skills list` and `skills show`
 */

import { resolve } from 'path';
import { LAUNCHER_ENV } from '@nanobot-launcher/core';
import {
  SkillRegistry,
  hasMissing,
  loadSkills,
  type MissingRequirements,
  type SkillManifest,
  type SkillSummary,
} from '@nanobot-launcher/skills';

type Env = Record<string, string | undefined>;

export const DEFAULT_SKILLS_DIR = 'skills';

export interface SkillStatus extends SkillSummary {
  missing: MissingRequirements;
  ready: boolean;
}

/**
 * --dir, then NANOBOT_SKILLS_DIR, then ./skills
 */
export function resolveSkillsDir(dir: string | undefined, env: Env, cwd: string = process.cwd()): string {
  return resolve(cwd, dir ?? (env[LAUNCHER_ENV.SKILLS_DIR] || DEFAULT_SKILLS_DIR));
}

export function listSkillStatuses(dir: string, env: Env): SkillStatus[] {
  const registry = new SkillRegistry(loadSkills(dir));
  return registry.list().map((summary) => {
    const missing = registry.missingRequirements(summary.name, env);
    return { ...summary, missing, ready: !hasMissing(missing) };
  });
}

/**
 * Look up one skill. Throws SKILL_NOT_FOUND for unknown names.
 */
export function showSkill(
  dir: string,
  name: string,
  env: Env
): { skill: SkillManifest; missing: MissingRequirements } {
  const registry = new SkillRegistry(loadSkills(dir));
  const skill = registry.get(name);
  return { skill, missing: registry.missingRequirements(name, env) };
}
