/**
 * Flat environment variable overrides, applied after a config is loaded.
 */

import type { GatewayConfig } from './schema.js';
import { isChannelName } from './schema.js';

type Env = Record<string, string | undefined>;

/**
 * Provider key variables, primary first
 */
export const PROVIDER_KEY_VARS: ReadonlyArray<{ providerId: string; envVars: readonly string[] }> = [
  { providerId: 'groq', envVars: ['GROQ_API_KEY', 'LITELLM_GROQ_API_KEY'] },
  { providerId: 'openrouter', envVars: ['OPENROUTER_API_KEY'] },
  { providerId: 'openai', envVars: ['OPENAI_API_KEY'] },
  { providerId: 'anthropic', envVars: ['ANTHROPIC_API_KEY'] },
  { providerId: 'deepseek', envVars: ['DEEPSEEK_API_KEY'] },
  { providerId: 'gemini', envVars: ['GEMINI_API_KEY'] },
  { providerId: 'zhipu', envVars: ['ZHIPU_API_KEY', 'ZHIPUAI_API_KEY'] },
];

function firstSet(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value) return value;
  }
  return undefined;
}

function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim());
}

/**
 * Apply environment overrides to a config. Returns a new config.
 */
export function applyEnvOverrides(config: GatewayConfig, env: Env): GatewayConfig {
  const result: GatewayConfig = structuredClone(config);

  for (const { providerId, envVars } of PROVIDER_KEY_VARS) {
    const key = firstSet(env, ...envVars);
    if (key) {
      result.providers[providerId] = { ...result.providers[providerId], apiKey: key };
    }
  }

  const model = firstSet(env, 'AGENT_MODEL', 'MODEL');
  if (model) result.agents.defaults.model = model;

  const workspace = firstSet(env, 'AGENT_WORKSPACE');
  if (workspace) result.agents.defaults.workspace = workspace;

  const telegramToken = firstSet(env, 'TELEGRAM_TOKEN');
  if (telegramToken) {
    result.channels.telegram.token = telegramToken;
    result.channels.telegram.enabled = true;
  }

  const allowed = firstSet(env, 'ALLOWED_USERS', 'TELEGRAM_ALLOWED_USERS');
  if (allowed) result.channels.telegram.allowFrom = splitList(allowed);

  if ((env.WHATSAPP_ENABLED ?? '').toLowerCase() === 'true') {
    result.channels.whatsapp.enabled = true;
  }

  const whatsappAllowed = firstSet(env, 'WHATSAPP_ALLOWED_NUMBERS');
  if (whatsappAllowed) result.channels.whatsapp.allowFrom = splitList(whatsappAllowed);

  const channels = firstSet(env, 'CHANNELS');
  if (channels) {
    for (const name of splitList(channels)) {
      const channel = name.toLowerCase();
      if (isChannelName(channel)) {
        result.channels[channel].enabled = true;
      }
    }
  }

  const searchKey = firstSet(env, 'ALEXZO_API_KEY');
  if (searchKey) result.tools.web.search.apiKey = searchKey;

  return result;
}
