/**
 * Shared failure handling for CLI commands
 */

import chalk from 'chalk';
import {
  LAUNCHER_ENV,
  createLogger,
  exitCodeForError,
  formatError,
  formatErrorDetails,
  isLogLevel,
  type Logger,
} from '@nanobot-launcher/core';

/**
 * Logger for CLI diagnostics, honouring NANOBOT_LAUNCHER_LOG_LEVEL
 */
export function cliLogger(env: Record<string, string | undefined> = process.env): Logger {
  const level = env[LAUNCHER_ENV.LOG_LEVEL]?.trim().toLowerCase();
  return createLogger({ name: 'cli', level: level && isLogLevel(level) ? level : undefined });
}

/**
 * Print the error, log its details at debug level, and exit with its code
 */
export function failCommand(error: unknown, logger: Logger = cliLogger()): never {
  console.error(chalk.red(formatError(error)));
  logger.debug('Command failed', formatErrorDetails(error));
  process.exit(exitCodeForError(error));
}
