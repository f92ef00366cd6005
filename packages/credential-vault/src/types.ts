/**
 * Credential Vault Types
 *
 * Types for provider credentials discovered at launch time.
 */

/**
 * LLM providers the gateway knows about
 */
export const KNOWN_PROVIDERS = [
  'groq',
  'openrouter',
  'openai',
  'anthropic',
  'deepseek',
  'gemini',
  'zhipu',
] as const;

export type KnownProviderId = (typeof KNOWN_PROVIDERS)[number];

/**
 * Provider identifier. Custom providers are allowed.
 */
export type ProviderId = KnownProviderId | (string & {});

/**
 * API key credential
 */
export interface ApiKeyCredential {
  /** Unique credential identifier */
  id: string;
  type: 'api_key';
  /** Provider this credential is for */
  providerId: ProviderId;
  /** The API key value */
  apiKey: string;
  /** Environment variable the key was read from */
  envVar: string;
  /** When the credential was discovered */
  createdAt: Date;
}

/**
 * Credential provider interface
 */
export interface CredentialProvider {
  /** Provider name */
  readonly name: string;

  /** Get a credential by ID */
  get(id: string): Promise<ApiKeyCredential | null>;

  /** Get the credential for an LLM provider */
  getByProvider(providerId: ProviderId): Promise<ApiKeyCredential | null>;

  /** Store a credential */
  store(credential: ApiKeyCredential): Promise<void>;

  /** Update a credential */
  update(id: string, updates: Partial<ApiKeyCredential>): Promise<void>;

  /** Delete a credential */
  delete(id: string): Promise<void>;

  /** List all credential IDs */
  list(): Promise<string[]>;

  /** List LLM providers that have a credential */
  listProviders(): Promise<ProviderId[]>;
}
