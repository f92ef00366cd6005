/**
 * nanobot-launch env - Show the launch decision without starting anything
 *
 * Usage:
 *   nanobot-launch env
 *   nanobot-launch env --json --show-secrets
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { resolveLauncherSettings } from '@nanobot-launcher/launcher';
import { failCommand } from '../errors.js';
import { buildLaunchPlan, describeReason } from '../plan.js';

interface EnvOptions {
  json: boolean;
  showSecrets: boolean;
}

export const envCommand = new Command('env')
  .description('Show how the gateway environment would be prepared')
  .option('--json', 'Output as JSON', false)
  .option('--show-secrets', 'Print credentials unmasked', false)
  .action((options: EnvOptions) => {
    try {
      const settings = resolveLauncherSettings(process.env);
      const plan = buildLaunchPlan(process.env, settings, { showSecrets: options.showSecrets });

      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
        return;
      }

      console.log(chalk.bold('\nLaunch Plan'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`Command:  ${chalk.cyan([plan.command, ...plan.args].join(' '))}`);
      console.log(`Decision: ${plan.synthesized ? chalk.green(describeReason(plan)) : describeReason(plan)}`);
      console.log(`${plan.configVar}: ${plan.configValue ?? chalk.gray('(unset)')}`);
      console.log(`PORT:     ${plan.port ?? chalk.gray('(unset, gateway default)')}`);
      console.log();
    } catch (error) {
      failCommand(error);
    }
  });
