import { redactSecrets } from '@nanobot-launcher/core';
import type { GatewayConfig } from './schema.js';

/**
 * Copy of a config that is safe to print
 */
export function redactConfig(config: GatewayConfig): GatewayConfig {
  return redactSecrets(config);
}
