/**
 * @nanobot-launcher/credential-vault
 *
 * Read-only discovery of LLM provider credentials from the environment.
 */

export type {
  ApiKeyCredential,
  CredentialProvider,
  KnownProviderId,
  ProviderId,
} from './types.js';
export { KNOWN_PROVIDERS } from './types.js';

export {
  EnvironmentCredentialProvider,
  createEnvironmentProvider,
  DEFAULT_MAPPINGS,
  type EnvironmentProviderConfig,
  type EnvironmentMapping,
} from './providers/index.js';
