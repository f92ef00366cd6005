/**
 * Credential Providers
 */

export {
  EnvironmentCredentialProvider,
  createEnvironmentProvider,
  DEFAULT_MAPPINGS,
  type EnvironmentProviderConfig,
  type EnvironmentMapping,
} from './environment.js';
