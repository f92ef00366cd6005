#!/usr/bin/env node
/**
 * nanobot-launch
 *
 * Prepares the environment for the nanobot gateway and starts it
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import { startCommand } from './commands/start.js';
import { envCommand } from './commands/env.js';
import { configCommand } from './commands/config.js';
import { providersCommand } from './commands/providers.js';
import { skillsCommand } from './commands/skills.js';

// Load environment variables
config();

const program = new Command();

program
  .name('nanobot-launch')
  .description('Prepare the environment for the nanobot gateway and start it')
  .version('0.1.0');

// Register commands
program.addCommand(startCommand, { isDefault: true });
program.addCommand(envCommand);
program.addCommand(configCommand);
program.addCommand(providersCommand);
program.addCommand(skillsCommand);

await program.parseAsync();
