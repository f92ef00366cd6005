/**
 * @nanobot-launcher/core
 *
 * Errors, logging, validation helpers and constants shared by the launcher packages.
 */

// Errors
export {
  LauncherError,
  Errors,
  isLauncherError,
  toLauncherError,
  ERROR_EXIT_CODES,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Logging
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from './logger.js';

// Utilities
export * from './utils/index.js';

// Constants
export {
  LAUNCHER_ENV,
  BOOTSTRAP_PROVIDER_ID,
  GATEWAY_COMMAND,
  GATEWAY_ARGS,
  DATA_DIR_NAME,
  CONFIG_FILE_NAME,
  FORWARDED_SIGNALS,
} from './constants.js';
