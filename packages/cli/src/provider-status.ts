/**
 * Provider listing behind `providers`
 */

import { maskSecret } from '@nanobot-launcher/core';
import {
  DEFAULT_MAPPINGS,
  KNOWN_PROVIDERS,
  type CredentialProvider,
  type ProviderId,
} from '@nanobot-launcher/credential-vault';

export interface ProviderStatus {
  providerId: ProviderId;
  configured: boolean;
  /** Variable the key was read from */
  envVar?: string;
  maskedKey?: string;
  /** Variables that would configure this provider */
  envVars: string[];
}

/**
 * Known providers in their usual order, then any custom provider with a key
 */
export async function providerStatuses(vault: CredentialProvider): Promise<ProviderStatus[]> {
  const configured = await vault.listProviders();
  const providers: ProviderId[] = [
    ...KNOWN_PROVIDERS,
    ...configured.filter((id) => !KNOWN_PROVIDERS.some((known) => known === id)),
  ];

  const statuses: ProviderStatus[] = [];
  for (const providerId of providers) {
    const credential = await vault.getByProvider(providerId);
    const envVars = DEFAULT_MAPPINGS.filter((m) => m.providerId === providerId).map((m) => m.envVar);

    statuses.push(
      credential
        ? {
            providerId,
            configured: true,
            envVar: credential.envVar,
            maskedKey: maskSecret(credential.apiKey),
            envVars,
          }
        : { providerId, configured: false, envVars }
    );
  }
  return statuses;
}
