import { parse as parseYaml } from 'yaml';
import { Errors, formatValidationErrors, validateSchema } from '@nanobot-launcher/core';
import { skillFrontmatterSchema, type SkillManifest } from './types.js';

const FRONTMATTER = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)([\s\S]*)$/;

/**
 * Parse a SKILL.md document
 */
export function parseSkillManifest(text: string, location: string): SkillManifest {
  const match = FRONTMATTER.exec(text.replace(/^\uFEFF/, ''));
  if (!match) {
    throw Errors.invalidSkill(location, 'missing frontmatter');
  }

  const [, header, body] = match;

  let data: unknown;
  try {
    data = parseYaml(header);
  } catch (error) {
    throw Errors.invalidSkill(location, error instanceof Error ? error.message : String(error));
  }

  const result = validateSchema(skillFrontmatterSchema, data ?? {});
  if (!result.success || !result.data) {
    throw Errors.invalidSkill(location, formatValidationErrors(result.errors ?? []).join('; '));
  }

  const instructions = body.trim();
  if (!instructions) {
    throw Errors.invalidSkill(location, 'instructions are empty');
  }

  return { ...result.data, instructions, location };
}
