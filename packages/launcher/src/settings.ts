/**
 * Launcher settings, resolved from the environment
 */

import {
  BOOTSTRAP_PROVIDER_ID,
  Errors,
  GATEWAY_ARGS,
  GATEWAY_COMMAND,
  LAUNCHER_ENV,
  LOG_LEVELS,
  formatValidationErrors,
  validateSchema,
  z,
  type LogLevel,
} from '@nanobot-launcher/core';

export interface LauncherSettings {
  /** Variable holding the bootstrap credential */
  credentialVar: string;
  /** Variable holding the gateway config JSON */
  configVar: string;
  /** Provider the credential is filed under */
  providerId: string;
  /** Executable to hand control to */
  command: string;
  /** Arguments for the executable */
  args: string[];
  /** Launcher diagnostics level */
  logLevel: LogLevel;
}

export const DEFAULT_LAUNCHER_SETTINGS: Readonly<LauncherSettings> = {
  credentialVar: LAUNCHER_ENV.CREDENTIAL,
  configVar: LAUNCHER_ENV.CONFIG,
  providerId: BOOTSTRAP_PROVIDER_ID,
  command: GATEWAY_COMMAND,
  args: [...GATEWAY_ARGS],
  logLevel: 'warn',
};

const overridesSchema = z.object({
  [LAUNCHER_ENV.COMMAND_OVERRIDE]: z
    .string()
    .optional()
    .transform((value) => value?.trim().split(/\s+/).filter(Boolean) ?? []),
  [LAUNCHER_ENV.LOG_LEVEL]: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() || undefined)
    .pipe(z.enum(LOG_LEVELS).optional()),
});

/**
 * Resolve settings. Without overrides this is the fixed gateway invocation.
 */
export function resolveLauncherSettings(env: Record<string, string | undefined>): LauncherSettings {
  const result = validateSchema(overridesSchema, {
    [LAUNCHER_ENV.COMMAND_OVERRIDE]: env[LAUNCHER_ENV.COMMAND_OVERRIDE],
    [LAUNCHER_ENV.LOG_LEVEL]: env[LAUNCHER_ENV.LOG_LEVEL],
  });

  if (!result.success || !result.data) {
    const problems = formatValidationErrors(result.errors ?? []);
    throw Errors.invalidSettings(`Invalid launcher settings: ${problems.join('; ')}`, {
      problems,
      validLogLevels: LOG_LEVELS,
    });
  }

  const [command, ...args] = result.data[LAUNCHER_ENV.COMMAND_OVERRIDE];

  return {
    ...DEFAULT_LAUNCHER_SETTINGS,
    ...(command ? { command, args } : { args: [...DEFAULT_LAUNCHER_SETTINGS.args] }),
    logLevel: result.data[LAUNCHER_ENV.LOG_LEVEL] ?? DEFAULT_LAUNCHER_SETTINGS.logLevel,
  };
}
