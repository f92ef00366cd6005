/**
 * nanobot-launch skills - Inspect the skill manifests shipped to the agent
 *
 * Usage:
 *   nanobot-launch skills list [--dir ./skills]
 *   nanobot-launch skills show browser
 *
 * Without --dir, NANOBOT_SKILLS_DIR or ./skills is used.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { MissingRequirements } from '@nanobot-launcher/skills';
import { failCommand } from '../errors.js';
import { listSkillStatuses, resolveSkillsDir, showSkill } from '../skill-status.js';

interface SkillsOptions {
  dir?: string;
}

function describeMissing(missing: MissingRequirements): string[] {
  const lines: string[] = [];
  if (missing.env.length > 0) lines.push(`environment: ${missing.env.join(', ')}`);
  if (missing.bins.length > 0) lines.push(`executables: ${missing.bins.join(', ')}`);
  return lines;
}

export const skillsCommand = new Command('skills')
  .description('Inspect agent skill manifests');

skillsCommand
  .command('list')
  .description('List available skills')
  .option('-d, --dir <dir>', 'Skills directory')
  .action((options: SkillsOptions) => {
    try {
      const dir = resolveSkillsDir(options.dir, process.env);
      const skills = listSkillStatuses(dir, process.env);

      if (skills.length === 0) {
        console.log(chalk.gray(`No skills found in ${dir}`));
        return;
      }

      console.log(chalk.bold('\nSkills\n'));
      for (const skill of skills) {
        const status = skill.ready ? chalk.green('✓') : chalk.yellow('!');
        console.log(`  ${status} ${chalk.cyan(skill.name.padEnd(16))} ${skill.description}`);
        if (skill.tools.length > 0) {
          console.log(chalk.gray(`      tools: ${skill.tools.join(', ')}`));
        }
        for (const line of describeMissing(skill.missing)) {
          console.log(chalk.yellow(`      missing ${line}`));
        }
      }
      console.log();
    } catch (error) {
      failCommand(error);
    }
  });

skillsCommand
  .command('show <name>')
  .description('Print a skill manifest')
  .option('-d, --dir <dir>', 'Skills directory')
  .action((name: string, options: SkillsOptions) => {
    try {
      const { skill, missing } = showSkill(resolveSkillsDir(options.dir, process.env), name, process.env);

      console.log(chalk.bold(`\n${skill.name}`) + chalk.gray(`  ${skill.location}`));
      console.log(skill.description);
      console.log(chalk.gray('─'.repeat(50)));
      console.log(skill.instructions);
      const lines = describeMissing(missing);
      if (lines.length > 0) {
        console.log();
        for (const line of lines) {
          console.log(chalk.yellow(`Missing ${line}`));
        }
      }
      console.log();
    } catch (error) {
      failCommand(error);
    }
  });
