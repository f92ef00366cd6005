/**
 * @nanobot-launcher/launcher
 *
 * Prepares the gateway environment and hands control to the gateway process.
 */

export {
  buildBootstrapConfig,
  createBootstrapConfig,
  type BootstrapConfig,
} from './bootstrap.js';

export {
  prepareEnvironment,
  type Env,
  type PreparedEnvironment,
  type PreparationReason,
} from './environment.js';

export {
  resolveLauncherSettings,
  DEFAULT_LAUNCHER_SETTINGS,
  type LauncherSettings,
} from './settings.js';

export {
  launchGateway,
  exitCodeFor,
  spawnError,
  type GatewayProcess,
  type SpawnFunction,
  type LaunchOptions,
  type LaunchResult,
} from './process.js';
