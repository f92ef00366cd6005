/**
 * Child environment preparation
 */

import { buildBootstrapConfig } from './bootstrap.js';
import type { LauncherSettings } from './settings.js';

export type Env = Record<string, string | undefined>;

export type PreparationReason =
  /** Config var was absent and a credential was present */
  | 'synthesized'
  /** Config var was already provided */
  | 'config-present'
  /** Neither config var nor credential */
  | 'credential-missing';

export interface PreparedEnvironment {
  /** Environment for the child process */
  env: Env;
  /** Whether a bootstrap config was written into the config var */
  synthesized: boolean;
  reason: PreparationReason;
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== '';
}

/**
 * Derive the child environment. The input is never mutated.
 *
 * PORT and every other variable pass through untouched.
 */
export function prepareEnvironment(
  env: Env,
  settings: Pick<LauncherSettings, 'credentialVar' | 'configVar' | 'providerId'>
): PreparedEnvironment {
  const childEnv: Env = { ...env };

  if (isPresent(env[settings.configVar])) {
    return { env: childEnv, synthesized: false, reason: 'config-present' };
  }

  const credential = env[settings.credentialVar];
  if (!isPresent(credential)) {
    return { env: childEnv, synthesized: false, reason: 'credential-missing' };
  }

  childEnv[settings.configVar] = buildBootstrapConfig(settings.providerId, credential);
  return { env: childEnv, synthesized: true, reason: 'synthesized' };
}
