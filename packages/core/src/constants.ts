/**
 * Constants shared by the launcher packages
 */

/**
 * Environment variables read by the launcher itself
 */
export const LAUNCHER_ENV = {
  /** Credential folded into a bootstrap config */
  CREDENTIAL: 'GROQ_API_KEY',
  /** JSON gateway configuration */
  CONFIG: 'NANOBOT_CONFIG',
  /** Port the gateway listens on (read by the gateway, never by the launcher) */
  PORT: 'PORT',
  /** Replaces the target invocation, whitespace-separated */
  COMMAND_OVERRIDE: 'NANOBOT_LAUNCHER_COMMAND',
  /** Launcher diagnostics level */
  LOG_LEVEL: 'NANOBOT_LAUNCHER_LOG_LEVEL',
  /** Directory the CLI reads skill manifests from */
  SKILLS_DIR: 'NANOBOT_SKILLS_DIR',
} as const;

/**
 * Provider the bootstrap credential is filed under
 */
export const BOOTSTRAP_PROVIDER_ID = 'groq';

/**
 * Fixed gateway invocation
 */
export const GATEWAY_COMMAND = 'python3';
export const GATEWAY_ARGS: readonly string[] = ['-m', 'nanobot', 'gateway'];

/**
 * Gateway data directory, relative to the home directory
 */
export const DATA_DIR_NAME = '.nanobot';
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Signals relayed to the gateway process
 */
export const FORWARDED_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;
