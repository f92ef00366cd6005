/**
 * @nanobot-launcher/config
 *
 * Resolves the gateway configuration the same way the gateway does at boot.
 */

export {
  gatewayConfigSchema,
  providerConfigSchema,
  createDefaultConfig,
  isChannelName,
  CHANNEL_NAMES,
  DEFAULT_MODEL,
  DEFAULT_WORKSPACE,
  DEFAULT_SEARCH_MAX_RESULTS,
  type GatewayConfig,
  type ProviderConfig,
  type ChannelName,
} from './schema.js';

export { migrateConfig } from './migrate.js';
export { applyEnvOverrides, PROVIDER_KEY_VARS } from './overrides.js';

export {
  loadConfig,
  validateSources,
  saveConfig,
  parseConfigJson,
  parseConfigData,
  getConfigPath,
  getDataDir,
  configFileCandidates,
  describeSource,
  type ConfigSource,
  type ConfigIssue,
  type LoadConfigOptions,
  type LoadedConfig,
  type SourceValidation,
} from './loader.js';

export { redactConfig } from './redact.js';
