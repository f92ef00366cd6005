/**
 * Environment Variable Credential Provider
 *
 * Reads provider API keys from environment variables.
 *
 * Besides the well-known variables (GROQ_API_KEY, OPENAI_API_KEY, ...), any
 * variable following NANOBOT_CRED_{PROVIDER}_API_KEY registers a key for a
 * custom provider:
 * - NANOBOT_CRED_MISTRAL_API_KEY=xxx      -> mistral
 * - NANOBOT_CRED_TOGETHER_AI_API_KEY=xxx  -> together-ai
 */

import { Errors } from '@nanobot-launcher/core';
import type { ApiKeyCredential, CredentialProvider, ProviderId } from '../types.js';

/**
 * Environment provider configuration
 */
export interface EnvironmentProviderConfig {
  /** Prefix for custom provider variables (default: NANOBOT_CRED) */
  prefix?: string;
  /** Extra mappings, checked after the defaults */
  mappings?: EnvironmentMapping[];
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}

/**
 * Environment variable mapping
 */
export interface EnvironmentMapping {
  /** Environment variable name */
  envVar: string;
  /** Provider this maps to */
  providerId: ProviderId;
}

/**
 * Default mappings. Earlier entries win when several variables name the same provider.
 */
export const DEFAULT_MAPPINGS: readonly EnvironmentMapping[] = [
  { envVar: 'GROQ_API_KEY', providerId: 'groq' },
  { envVar: 'LITELLM_GROQ_API_KEY', providerId: 'groq' },
  { envVar: 'OPENROUTER_API_KEY', providerId: 'openrouter' },
  { envVar: 'OPENAI_API_KEY', providerId: 'openai' },
  { envVar: 'ANTHROPIC_API_KEY', providerId: 'anthropic' },
  { envVar: 'DEEPSEEK_API_KEY', providerId: 'deepseek' },
  { envVar: 'GEMINI_API_KEY', providerId: 'gemini' },
  { envVar: 'ZHIPU_API_KEY', providerId: 'zhipu' },
  { envVar: 'ZHIPUAI_API_KEY', providerId: 'zhipu' },
];

const KEY_SUFFIX = '_API_KEY';

/**
 * Environment variable credential provider
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  readonly name = 'environment';
  private readonly prefix: string;
  private readonly mappings: EnvironmentMapping[];
  private readonly env: Record<string, string | undefined>;
  private cache: Map<string, ApiKeyCredential> = new Map();
  private initialized = false;

  constructor(config: EnvironmentProviderConfig = {}) {
    this.prefix = config.prefix ?? 'NANOBOT_CRED';
    this.mappings = [...DEFAULT_MAPPINGS, ...(config.mappings ?? [])];
    this.env = config.env ?? process.env;
  }

  /**
   * Initialize by reading environment variables
   */
  private initialize(): void {
    if (this.initialized) return;

    for (const mapping of this.mappings) {
      this.add(mapping.providerId, mapping.envVar);
    }

    const prefix = this.prefix + '_';
    for (const key of Object.keys(this.env).sort()) {
      if (!key.startsWith(prefix) || !key.endsWith(KEY_SUFFIX)) continue;

      const name = key.slice(prefix.length, key.length - KEY_SUFFIX.length);
      if (!name) continue;

      this.add(name.toLowerCase().replace(/_/g, '-'), key);
    }

    this.initialized = true;
  }

  private add(providerId: ProviderId, envVar: string): void {
    const value = this.env[envVar];
    if (!value) return;

    const id = credentialId(providerId);
    if (this.cache.has(id)) return;

    this.cache.set(id, {
      id,
      type: 'api_key',
      providerId,
      apiKey: value,
      envVar,
      createdAt: new Date(),
    });
  }

  async get(id: string): Promise<ApiKeyCredential | null> {
    this.initialize();
    return this.cache.get(id) ?? null;
  }

  async getByProvider(providerId: ProviderId): Promise<ApiKeyCredential | null> {
    return this.get(credentialId(providerId));
  }

  async store(_credential: ApiKeyCredential): Promise<void> {
    throw Errors.readOnlyProvider(this.name);
  }

  async update(_id: string, _updates: Partial<ApiKeyCredential>): Promise<void> {
    throw Errors.readOnlyProvider(this.name);
  }

  async delete(_id: string): Promise<void> {
    throw Errors.readOnlyProvider(this.name);
  }

  async list(): Promise<string[]> {
    this.initialize();
    return Array.from(this.cache.keys());
  }

  async listProviders(): Promise<ProviderId[]> {
    this.initialize();
    return Array.from(this.cache.values(), (cred) => cred.providerId);
  }

  /**
   * Reload credentials from environment
   */
  reload(): void {
    this.cache.clear();
    this.initialized = false;
    this.initialize();
  }
}

function credentialId(providerId: ProviderId): string {
  return `env-${providerId}-api_key`;
}

/**
 * Create an environment credential provider
 */
export function createEnvironmentProvider(config?: EnvironmentProviderConfig): EnvironmentCredentialProvider {
  return new EnvironmentCredentialProvider(config);
}
