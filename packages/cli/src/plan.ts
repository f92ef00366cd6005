/**
 * Dry-run view of what `start` would do
 */

import { LAUNCHER_ENV, maskSecret, redactSecrets } from '@nanobot-launcher/core';
import {
  prepareEnvironment,
  type Env,
  type LauncherSettings,
  type PreparationReason,
} from '@nanobot-launcher/launcher';

export interface LaunchPlan {
  command: string;
  args: string[];
  reason: PreparationReason;
  synthesized: boolean;
  configVar: string;
  credentialVar: string;
  /** Config value the gateway will receive, redacted unless requested */
  configValue?: string;
  /** PORT as the gateway will see it */
  port?: string;
}

/**
 * Redact a config JSON string for display. Anything other than a JSON object
 * or array is masked whole.
 */
export function redactConfigValue(value: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return maskSecret(value);
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return maskSecret(value);
  }
  return JSON.stringify(redactSecrets(parsed));
}

export function buildLaunchPlan(
  env: Env,
  settings: LauncherSettings,
  options: { showSecrets?: boolean } = {}
): LaunchPlan {
  const prepared = prepareEnvironment(env, settings);
  const configValue = prepared.env[settings.configVar];

  return {
    command: settings.command,
    args: settings.args,
    reason: prepared.reason,
    synthesized: prepared.synthesized,
    configVar: settings.configVar,
    credentialVar: settings.credentialVar,
    configValue: configValue && !options.showSecrets ? redactConfigValue(configValue) : configValue,
    port: prepared.env[LAUNCHER_ENV.PORT],
  };
}

export function describeReason(plan: Pick<LaunchPlan, 'reason' | 'configVar' | 'credentialVar'>): string {
  switch (plan.reason) {
    case 'synthesized':
      return `${plan.configVar} synthesized from ${plan.credentialVar}`;
    case 'config-present':
      return `${plan.configVar} provided, passed through unchanged`;
    case 'credential-missing':
      return `${plan.credentialVar} not set, environment passed through unchanged`;
  }
}
