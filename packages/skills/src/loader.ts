import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { parseSkillManifest } from './parser.js';
import type { SkillManifest } from './types.js';

export const SKILL_FILE_NAME = 'SKILL.md';

/**
 * Load every `<dir>/<skill>/SKILL.md`, sorted by directory name
 */
export function loadSkills(dir: string): SkillManifest[] {
  if (!existsSync(dir)) return [];

  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name, SKILL_FILE_NAME))
    .filter((path) => existsSync(path))
    .map((path) => parseSkillManifest(readFileSync(path, 'utf-8'), path));
}
