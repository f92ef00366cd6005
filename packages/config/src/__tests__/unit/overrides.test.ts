import { describe, it, expect } from 'vitest';
import { applyEnvOverrides } from '../../overrides.js';
import { createDefaultConfig } from '../../schema.js';

describe('applyEnvOverrides', () => {
  it('returns an equal config when nothing is set', () => {
    const config = createDefaultConfig();
    const result = applyEnvOverrides(config, {});

    expect(result).toEqual(config);
    expect(result).not.toBe(config);
  });

  it('sets provider keys, preferring the primary variable', () => {
    const result = applyEnvOverrides(createDefaultConfig(), {
      GROQ_API_KEY: 'groq-primary',
      LITELLM_GROQ_API_KEY: 'groq-alias',
      ZHIPUAI_API_KEY: 'zhipu-alias',
      OPENAI_API_KEY: '',
    });

    expect(result.providers).toEqual({
      groq: { apiKey: 'groq-primary' },
      zhipu: { apiKey: 'zhipu-alias' },
    });
  });

  it('keeps other provider settings when overriding a key', () => {
    const config = createDefaultConfig();
    config.providers.openai = { apiKey: 'old', apiBase: 'https://llm.example.test/v1' };

    const result = applyEnvOverrides(config, { OPENAI_API_KEY: 'new' });

    expect(result.providers.openai).toEqual({ apiKey: 'new', apiBase: 'https://llm.example.test/v1' });
    expect(config.providers.openai.apiKey).toBe('old');
  });

  it('overrides agent defaults', () => {
    const result = applyEnvOverrides(createDefaultConfig(), {
      MODEL: 'fallback-model',
      AGENT_MODEL: 'openai/gpt-4o-mini',
      AGENT_WORKSPACE: '/srv/workspace',
    });

    expect(result.agents.defaults).toEqual({ model: 'openai/gpt-4o-mini', workspace: '/srv/workspace' });
  });

  it('enables telegram from a token and trims the allow list', () => {
    const result = applyEnvOverrides(createDefaultConfig(), {
      TELEGRAM_TOKEN: 'test-token',
      TELEGRAM_ALLOWED_USERS: 'alice, bob ,carol',
    });

    expect(result.channels.telegram).toEqual({
      enabled: true,
      token: 'test-token',
      allowFrom: ['alice', 'bob', 'carol'],
    });
  });

  it('configures whatsapp', () => {
    const result = applyEnvOverrides(createDefaultConfig(), {
      WHATSAPP_ENABLED: 'TRUE',
      WHATSAPP_ALLOWED_NUMBERS: '+15550001, +15550002',
    });

    expect(result.channels.whatsapp).toEqual({ enabled: true, allowFrom: ['+15550001', '+15550002'] });
  });

  it('enables known channels listed in CHANNELS', () => {
    const result = applyEnvOverrides(createDefaultConfig(), { CHANNELS: 'Telegram, whatsapp, discord' });

    expect(result.channels.telegram.enabled).toBe(true);
    expect(result.channels.whatsapp.enabled).toBe(true);
  });

  it('sets the web search key', () => {
    const result = applyEnvOverrides(createDefaultConfig(), { ALEXZO_API_KEY: 'search-key' });
    expect(result.tools.web.search.apiKey).toBe('search-key');
  });
});
