/**
 * Bootstrap configuration synthesized from a single provider credential.
 *
 * Output shape: {"providers":{"<provider>":{"api_key":"<key>"}}}
 */

export interface BootstrapConfig {
  providers: Record<string, { api_key: string }>;
}

export function createBootstrapConfig(providerId: string, apiKey: string): BootstrapConfig {
  return { providers: { [providerId]: { api_key: apiKey } } };
}

/**
 * Serialize the bootstrap config. JSON encoding keeps every key byte intact,
 * quotes and backslashes included.
 */
export function buildBootstrapConfig(providerId: string, apiKey: string): string {
  return JSON.stringify(createBootstrapConfig(providerId, apiKey));
}
