/**
 * nanobot-launch config - Inspect the configuration the gateway will load
 *
 * Usage:
 *   nanobot-launch config show [--path config.json] [--json]
 *   nanobot-launch config validate [--path config.json]
 *   nanobot-launch config init [--path config.json] [--force]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createLogger } from '@nanobot-launcher/core';
import { describeSource, loadConfig, redactConfig } from '@nanobot-launcher/config';
import { prepareEnvironment, resolveLauncherSettings } from '@nanobot-launcher/launcher';
import { checkConfig, initConfig } from '../config-check.js';
import { failCommand } from '../errors.js';

interface ShowOptions {
  path?: string;
  json: boolean;
}

interface ValidateOptions {
  path?: string;
}

interface InitOptions {
  path?: string;
  force: boolean;
}

export const configCommand = new Command('config')
  .description('Inspect the gateway configuration');

/**
 * The environment the gateway will actually start with
 */
function gatewayEnv(): Record<string, string | undefined> {
  return prepareEnvironment(process.env, resolveLauncherSettings(process.env)).env;
}

/**
 * Show the resolved configuration
 */
configCommand
  .command('show')
  .description('Show the resolved configuration with secrets masked')
  .option('-p, --path <file>', 'Config file to read instead of the default locations')
  .option('--json', 'Output as JSON', false)
  .action((options: ShowOptions) => {
    try {
      const { config, source, issues } = loadConfig({
        env: gatewayEnv(),
        configPath: options.path,
        logger: createLogger({ name: 'config' }),
      });
      const redacted = redactConfig(config);

      if (options.json) {
        console.log(JSON.stringify({ source: describeSource(source), config: redacted }, null, 2));
        return;
      }

      console.log(chalk.bold('\nGateway Configuration'));
      console.log(chalk.gray('─'.repeat(50)));
      console.log(`Source:  ${chalk.cyan(describeSource(source))}`);
      if (issues.length > 0) {
        console.log(`Skipped: ${chalk.yellow(issues.map((issue) => describeSource(issue.source)).join(', '))}`);
      }
      console.log(chalk.gray('─'.repeat(50)));
      console.log(JSON.stringify(redacted, null, 2));
      console.log();
    } catch (error) {
      failCommand(error);
    }
  });

/**
 * Validate every configuration source that is present
 */
configCommand
  .command('validate')
  .description('Check that every present configuration source parses')
  .option('-p, --path <file>', 'Config file to read instead of the default locations')
  .action((options: ValidateOptions) => {
    const spinner = ora('Validating configuration...').start();

    try {
      const check = checkConfig({ env: gatewayEnv(), configPath: options.path });

      if (check.issues.length > 0) {
        spinner.fail('Configuration has problems');
        console.log();
        for (const issue of check.issues) {
          console.log(chalk.red(`  ✗ ${describeSource(issue.source)}: ${issue.message}`));
        }
        console.log();
        process.exit(check.exitCode);
      }

      if (check.checked.length === 0) {
        spinner.succeed('No configuration found, the gateway will use defaults');
        return;
      }
      spinner.succeed(`Configuration is valid (${check.checked.map(describeSource).join(', ')})`);
    } catch (error) {
      spinner.fail('Validation failed');
      failCommand(error);
    }
  });

/**
 * Write a default configuration file
 */
configCommand
  .command('init')
  .description('Write a default configuration file')
  .option('-p, --path <file>', 'Where to write the file (default: ~/.nanobot/config.json)')
  .option('-f, --force', 'Overwrite an existing file', false)
  .action((options: InitOptions) => {
    try {
      const path = initConfig({ path: options.path, force: options.force });
      console.log(chalk.green(`✓ Wrote ${path}`));
    } catch (error) {
      failCommand(error);
    }
  });
