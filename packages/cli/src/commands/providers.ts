/**
 * nanobot-launch providers - List LLM providers and whether they have a key
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createEnvironmentProvider } from '@nanobot-launcher/credential-vault';
import { failCommand } from '../errors.js';
import { providerStatuses } from '../provider-status.js';

export const providersCommand = new Command('providers')
  .description('List LLM providers configured through the environment')
  .action(async () => {
    try {
      const statuses = await providerStatuses(createEnvironmentProvider());

      console.log(chalk.bold('\nLLM Providers\n'));
      for (const status of statuses) {
        const name = chalk.cyan(status.providerId.padEnd(12));
        if (status.configured) {
          console.log(`  ${name} ${chalk.green('✓ configured')} ` + chalk.gray(`(${status.envVar}=${status.maskedKey})`));
          continue;
        }

        console.log(`  ${name} ${chalk.gray('○ not configured')}`);
        if (status.envVars.length > 0) {
          console.log(chalk.gray(`    Set ${status.envVars.join(' or ')} to enable`));
        }
      }
      console.log();
    } catch (error) {
      failCommand(error);
    }
  });
