/**
 * Gateway configuration schema
 *
 * Mirrors the settings the gateway reads at boot. Keys are camelCase here;
 * snake_case input is converted before validation.
 */

import { z } from '@nanobot-launcher/core';

export const DEFAULT_MODEL = 'groq/llama-3.3-70b-versatile';
export const DEFAULT_WORKSPACE = '~/.nanobot/workspace';
export const DEFAULT_SEARCH_MAX_RESULTS = 5;

export const providerConfigSchema = z.object({
  apiKey: z.string().default(''),
  apiBase: z.string().optional(),
});

export const providersConfigSchema = z.record(z.string(), providerConfigSchema).default({});

export const agentDefaultsSchema = z.object({
  model: z.string().min(1).default(DEFAULT_MODEL),
  workspace: z.string().min(1).default(DEFAULT_WORKSPACE),
});

export const agentsConfigSchema = z.object({
  defaults: agentDefaultsSchema.default({}),
});

export const telegramConfigSchema = z.object({
  enabled: z.boolean().default(false),
  token: z.string().default(''),
  allowFrom: z.array(z.string()).default([]),
});

export const whatsappConfigSchema = z.object({
  enabled: z.boolean().default(false),
  allowFrom: z.array(z.string()).default([]),
});

export const channelsConfigSchema = z.object({
  telegram: telegramConfigSchema.default({}),
  whatsapp: whatsappConfigSchema.default({}),
});

export const webSearchConfigSchema = z.object({
  apiKey: z.string().default(''),
  maxResults: z.number().int().positive().default(DEFAULT_SEARCH_MAX_RESULTS),
});

export const toolsConfigSchema = z.object({
  web: z
    .object({
      search: webSearchConfigSchema.default({}),
    })
    .default({}),
  restrictToWorkspace: z.boolean().default(false),
});

export const gatewayConfigSchema = z.object({
  providers: providersConfigSchema,
  agents: agentsConfigSchema.default({}),
  channels: channelsConfigSchema.default({}),
  tools: toolsConfigSchema.default({}),
});

export type ProviderConfig = z.infer<typeof providerConfigSchema>;
export type GatewayConfig = z.infer<typeof gatewayConfigSchema>;
export type ChannelName = keyof GatewayConfig['channels'];

export const CHANNEL_NAMES: readonly ChannelName[] = ['telegram', 'whatsapp'];

export function isChannelName(value: string): value is ChannelName {
  return CHANNEL_NAMES.some((name) => name === value);
}

/**
 * A config with every default filled in
 */
export function createDefaultConfig(): GatewayConfig {
  return gatewayConfigSchema.parse({});
}
