import { Errors } from '@nanobot-launcher/core';
import { missingRequirements, type MissingRequirements } from './requirements.js';
import type { SkillManifest, SkillSummary } from './types.js';

export class SkillRegistry {
  private readonly skills = new Map<string, SkillManifest>();

  constructor(skills: SkillManifest[] = []) {
    for (const skill of skills) {
      this.register(skill);
    }
  }

  register(skill: SkillManifest): void {
    if (this.skills.has(skill.name)) {
      throw Errors.duplicateSkill(skill.name);
    }
    this.skills.set(skill.name, skill);
  }

  has(name: string): boolean {
    return this.skills.has(name);
  }

  get(name: string): SkillManifest {
    const skill = this.skills.get(name);
    if (!skill) {
      throw Errors.skillNotFound(name);
    }
    return skill;
  }

  list(): SkillSummary[] {
    return Array.from(this.skills.values(), ({ name, description, tools, location }) => ({
      name,
      description,
      tools,
      location,
    }));
  }

  /**
   * Requirements of a skill that the given environment does not meet
   */
  missingRequirements(name: string, env: Record<string, string | undefined>): MissingRequirements {
    return missingRequirements(this.get(name).requires, env);
  }
}
