/**
 * @nanobot-launcher/skills
 *
 * Loading and validation of agent skill manifests (SKILL.md).
 */

export {
  skillFrontmatterSchema,
  type SkillFrontmatter,
  type SkillManifest,
  type SkillSummary,
} from './types.js';
export { parseSkillManifest } from './parser.js';
export { loadSkills, SKILL_FILE_NAME } from './loader.js';
export { SkillRegistry } from './registry.js';
export {
  findExecutable,
  missingRequirements,
  hasMissing,
  type MissingRequirements,
} from './requirements.js';
