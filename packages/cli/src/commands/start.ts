/**
 * nanobot-launch start - Prepare the environment and run the gateway
 *
 * Usage:
 *   nanobot-launch            # same as start
 *   nanobot-launch start
 */

import { Command } from 'commander';
import { exitCodeFor, launchGateway } from '@nanobot-launcher/launcher';
import { failCommand } from '../errors.js';

export const startCommand = new Command('start')
  .description('Prepare the environment and hand control to the gateway')
  .action(async () => {
    try {
      const result = await launchGateway();
      process.exit(exitCodeFor(result));
    } catch (error) {
      failCommand(error);
    }
  });
